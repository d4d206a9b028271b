/**
 * Webhooky
 *
 * Job triggers, provider webhooks and OAuth callbacks for the default
 * company.
 */

import { Hono } from "hono";
import {
  RecordStore,
  checkr,
  errorMessage,
  getConfig,
  mailchimp,
  setupLogger,
  type Queryable,
} from "@cio/connector";
import { createJobContext, type JobContext } from "../jobs/context.js";
import { isJobName } from "../jobs/registry.js";
import { startJob } from "../jobs/runner.js";
import { refreshBackgroundCheck } from "../jobs/sync-background-checks.js";
import { BackgroundChecks } from "../records/background-checks.js";
import { getCompanyByMailchimpList, getCompanyByName, type Company } from "../records/companies.js";
import { getFunctionBySagaId, statusColor } from "../records/functions.js";
import { MailingListSubscribers, mailingListSubscriberFromWebhook } from "../records/mailing-list.js";
import { RackLineSubscribers, rackLineSubscriberFromWebhook, upsertRackLineSubscriber } from "../records/rack-line.js";
import { ApiTokenStore } from "../token-store.js";
import { authMiddleware, createUnauthorizedResponse } from "./middleware/auth.js";
import { isOAuthProduct, oauthFlows, type OAuthFlows } from "./oauth.js";

const logger = setupLogger("webhooky");

export interface AppOptions {
  db: Queryable;
  createContext?: (db: Queryable, company: Company) => JobContext;
  oauth?: OAuthFlows;
}

export function createApp(options: AppOptions): Hono {
  const { db } = options;
  const createContext = options.createContext ?? createJobContext;
  const flows = options.oauth ?? oauthFlows();

  const defaultCompany = async (): Promise<Company> => {
    const name = getConfig().CIO_COMPANY_NAME;
    const company = await getCompanyByName(db, name);
    if (company === null) {
      throw new Error(`Company ${name} not found`);
    }
    return company;
  };

  const app = new Hono();

  // ===========================================================================
  // Errors
  // ===========================================================================
  app.onError((error, c) => {
    logger.error(`${c.req.method} ${c.req.path} failed: ${errorMessage(error)}`);
    return c.json({ error: errorMessage(error) }, 500);
  });

  app.get("/", (c) => c.json({ status: "ok" }));

  // ===========================================================================
  // Jobs (bearer token)
  // ===========================================================================
  app.use("/run/*", authMiddleware);
  app.use("/functions/*", authMiddleware);

  app.post("/run/:job", async (c) => {
    const name = c.req.param("job");
    if (!isJobName(name)) {
      return c.json({ error: `Unknown job: ${name}` }, 404);
    }

    const ctx = createContext(db, await defaultCompany());
    const started = await startJob(name, ctx, { background: true });
    return c.json({ id: started.sagaId }, 202);
  });

  app.get("/functions/:sagaId", async (c) => {
    const fn = await getFunctionBySagaId(db, c.req.param("sagaId"));
    if (fn === null) {
      return c.json({ error: "Function not found" }, 404);
    }
    return c.json({ ...fn, color: statusColor(fn.status, fn.conclusion) });
  });

  // ===========================================================================
  // Checkr
  // ===========================================================================
  app.post("/checkr/background/update", async (c) => {
    const body = await c.req.text();
    const company = await defaultCompany();
    const key = company.checkr_api_key || getConfig().CHECKR_API_KEY;
    const signature = c.req.header("X-Checkr-Signature");

    if (key === undefined || signature === undefined || !checkr.verifyWebhookSignature(key, signature, body)) {
      logger.warn("Rejected Checkr webhook with a bad signature");
      return createUnauthorizedResponse(c);
    }

    const event = checkr.WebhookEventSchema.parse(JSON.parse(body));
    if (!event.type.startsWith("report.")) {
      logger.debug(`Ignoring Checkr ${event.type} event`);
      return c.body(null, 202);
    }

    const ctx = createContext(db, company);
    const report = checkr.ReportSchema.parse(event.data.object);
    const check = await refreshBackgroundCheck(ctx, report);
    await new RecordStore(BackgroundChecks, db).upsertInAirtable(ctx.airtable("hiring"), check);
    logger.info(`Updated background check for report ${report.id}`, { status: report.status });
    return c.body(null, 202);
  });

  // ===========================================================================
  // MailChimp
  // ===========================================================================

  // MailChimp validates the URL with a GET before saving the webhook
  app.get("/mailchimp/*", (c) => c.body(null, 200));

  app.use("/mailchimp/*", async (c, next) => {
    const key = getConfig().MAILCHIMP_WEBHOOK_KEY;
    if (key !== undefined && c.req.query("key") !== key) {
      return createUnauthorizedResponse(c);
    }
    await next();
  });

  const readWebhook = (body: string): mailchimp.Webhook | null => {
    const webhook = mailchimp.parseWebhook(body);
    if (webhook.type !== "subscribe") {
      logger.debug(`Ignoring MailChimp ${webhook.type} event`);
      return null;
    }
    return webhook;
  };

  app.post("/mailchimp/mailing-list", async (c) => {
    const webhook = readWebhook(await c.req.text());
    if (webhook === null) {
      return c.body(null, 202);
    }

    const listId = webhook.data.list_id ?? "";
    const company = await getCompanyByMailchimpList(db, listId);
    if (company === null) {
      logger.warn(`No company uses MailChimp list ${listId}`);
      return c.body(null, 202);
    }

    const subscriber = mailingListSubscriberFromWebhook(webhook, company.id);
    if (subscriber === null) {
      logger.warn("MailChimp subscribe event has no email");
      return c.body(null, 202);
    }

    const ctx = createContext(db, company);
    const store = new RecordStore(MailingListSubscribers, db);
    const stored = await store.upsert(subscriber);
    await store.upsertInAirtable(ctx.airtable("customer_leads"), stored);
    logger.info(`${stored.email} subscribed to the mailing list`);
    return c.body(null, 202);
  });

  app.post("/mailchimp/rack-line", async (c) => {
    const webhook = readWebhook(await c.req.text());
    if (webhook === null) {
      return c.body(null, 202);
    }

    const company = await defaultCompany();
    const subscriber = rackLineSubscriberFromWebhook(webhook, company.id);
    if (subscriber === null) {
      logger.warn("MailChimp subscribe event has no email");
      return c.body(null, 202);
    }

    const ctx = createContext(db, company);
    const stored = await upsertRackLineSubscriber(db, subscriber);
    await new RecordStore(RackLineSubscribers, db).upsertInAirtable(ctx.airtable("customer_leads"), stored);
    logger.info(`${stored.email} joined the rack line waitlist`);
    return c.body(null, 202);
  });

  // ===========================================================================
  // OAuth
  // ===========================================================================
  app.get("/auth/:product/consent", (c) => {
    const product = c.req.param("product");
    if (!isOAuthProduct(product)) {
      return c.json({ error: `Unknown product: ${product}` }, 404);
    }
    return c.json({ url: flows[product].consentUrl() });
  });

  app.get("/auth/:product/callback", async (c) => {
    const product = c.req.param("product");
    if (!isOAuthProduct(product)) {
      return c.json({ error: `Unknown product: ${product}` }, 404);
    }
    const code = c.req.query("code");
    if (!code) {
      return c.json({ error: "Missing code" }, 400);
    }

    const company = await defaultCompany();
    const { tokens, details } = await flows[product].exchange(code, c.req.query());
    const token = await new ApiTokenStore(db, company).saveWithDetails(product, tokens, details);
    logger.info(`Saved ${product} token for ${company.name}`);
    return c.json({ product: token.product, expires_date: token.expires_date });
  });

  return app;
}
