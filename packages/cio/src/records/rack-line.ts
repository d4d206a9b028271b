/**
 * Rack line waitlist subscribers
 *
 * A separate MailChimp list; new signups are pushed to Zoho as leads.
 */

import { z } from "zod";
import { RecordStore, defineRecord, type Queryable, type Stored, type mailchimp } from "@cio/connector";
import { companyId, flag, list, text, timestamp } from "./fields.js";
import { keepLinkToPeople, memberDates } from "./mailing-list.js";

export const NewRackLineSubscriberSchema = z.object({
  email: z.string(),
  name: text,
  company: text,
  company_size: text,
  interest: text,
  date_added: timestamp,
  date_optin: timestamp,
  date_last_changed: timestamp,
  notes: text,
  tags: list,
  link_to_people: list,
  zoho_lead_id: text,
  zoho_lead_exclude: flag,
  cio_company_id: companyId,
});

export type NewRackLineSubscriber = z.infer<typeof NewRackLineSubscriberSchema>;
export type RackLineSubscriber = Stored<NewRackLineSubscriber>;

export const RackLineSubscribers = defineRecord({
  name: "RackLineSubscriber",
  table: "rack_line_subscribers",
  schema: NewRackLineSubscriberSchema,
  matchOn: ["email"],
  airtable: {
    base: "customer_leads",
    table: "Rack Line Signups",
    beforeUpdate: (_record, fields, { existing }) => keepLinkToPeople(fields, existing),
  },
});

export function rackLineSubscriberFromMember(
  member: mailchimp.Member,
  cioCompanyId: number,
  now: Date = new Date()
): NewRackLineSubscriber {
  const merge = member.merge_fields;
  return {
    email: member.email_address.trim(),
    name: merge.NAME,
    company: merge.COMPANY,
    company_size: merge.CSIZE,
    interest: merge.NOTES,
    ...memberDates(member, now),
    notes: member.last_note?.note ?? "",
    tags: member.tags.map((tag) => tag.name),
    link_to_people: [],
    zoho_lead_id: "",
    zoho_lead_exclude: false,
    cio_company_id: cioCompanyId,
  };
}

export function rackLineSubscriberFromWebhook(
  webhook: mailchimp.Webhook,
  cioCompanyId: number
): NewRackLineSubscriber | null {
  const merges = webhook.data.merges ?? {};
  const email = (merges.EMAIL ?? webhook.data.email ?? "").trim();
  if (email === "") {
    return null;
  }

  return {
    email,
    name: (merges.NAME ?? "").trim(),
    company: (merges.COMPANY ?? "").trim(),
    company_size: (merges.CSIZE ?? "").trim(),
    interest: (merges.NOTES ?? "").trim(),
    date_added: webhook.fired_at,
    date_optin: webhook.fired_at,
    date_last_changed: webhook.fired_at,
    notes: "",
    tags: [],
    link_to_people: [],
    zoho_lead_id: "",
    zoho_lead_exclude: false,
    cio_company_id: cioCompanyId,
  };
}

/**
 * Upsert without losing the Zoho lead written back by the lead push.
 */
export async function upsertRackLineSubscriber(db: Queryable, subscriber: NewRackLineSubscriber): Promise<RackLineSubscriber> {
  const store = new RecordStore(RackLineSubscribers, db);
  const existing = await store.getFromDb(subscriber);
  if (existing === null) {
    return store.create(subscriber);
  }
  return store.update({
    ...subscriber,
    id: existing.id,
    airtable_record_id: existing.airtable_record_id,
    zoho_lead_id: subscriber.zoho_lead_id || existing.zoho_lead_id,
    zoho_lead_exclude: subscriber.zoho_lead_exclude || existing.zoho_lead_exclude,
  });
}
