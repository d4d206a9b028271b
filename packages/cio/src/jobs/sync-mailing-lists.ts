/**
 * MailChimp lists
 *
 * The company's mailing list and the rack line waitlist list.
 */

import { RecordStore, getConfig, setupLogger } from "@cio/connector";
import { MailingListSubscribers, mailingListSubscriberFromMember } from "../records/mailing-list.js";
import { RackLineSubscribers, rackLineSubscriberFromMember, upsertRackLineSubscriber } from "../records/rack-line.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-mailing-lists");

export async function syncMailingList(ctx: JobContext): Promise<number> {
  const listId = ctx.company.mailchimp_list_id;
  if (listId === "") {
    logger.info(`${ctx.company.name} has no MailChimp list, skipping`);
    return 0;
  }

  const mailchimp = await ctx.clients.mailchimp();
  const members = await mailchimp.getSubscribers(listId);
  const store = new RecordStore(MailingListSubscribers, ctx.db);
  for (const member of members) {
    await store.upsert(mailingListSubscriberFromMember(member, ctx.company.id, ctx.now()));
  }
  logger.info(`Synced ${members.length} mailing list subscribers`);

  await mirrorToAirtable(ctx, MailingListSubscribers);
  return members.length;
}

export async function syncRackLine(ctx: JobContext, listId = getConfig().MAILCHIMP_LIST_ID_RACK_LINE): Promise<number> {
  if (listId === undefined) {
    logger.info("MAILCHIMP_LIST_ID_RACK_LINE is not set, skipping the rack line list");
    return 0;
  }

  const mailchimp = await ctx.clients.mailchimp();
  const members = await mailchimp.getSubscribers(listId);
  for (const member of members) {
    await upsertRackLineSubscriber(ctx.db, rackLineSubscriberFromMember(member, ctx.company.id, ctx.now()));
  }
  logger.info(`Synced ${members.length} rack line subscribers`);

  await mirrorToAirtable(ctx, RackLineSubscribers);
  return members.length;
}

export async function syncMailingLists(ctx: JobContext): Promise<void> {
  await syncMailingList(ctx);
  await syncRackLine(ctx);
}
