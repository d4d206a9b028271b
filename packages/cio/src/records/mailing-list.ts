/**
 * Mailing list subscribers
 *
 * Filled from the company's MailChimp list and kept current by its
 * subscribe webhook.
 */

import { z } from "zod";
import { defineRecord, type AirtableFields, type Stored, type mailchimp } from "@cio/connector";
import { amount, companyId, flag, list, text, timestamp } from "./fields.js";

/** MailChimp interest ids of the list's signup checkboxes */
export const INTEREST_PODCAST = "ff0295f7d1";
export const INTEREST_NEWSLETTER = "7f57718c10";
export const INTEREST_PRODUCT = "6a6cb58277";

export const NewMailingListSubscriberSchema = z.object({
  email: z.string(),
  first_name: text,
  last_name: text,
  name: text,
  company: text,
  interest: text,
  wants_podcast_updates: flag,
  wants_newsletter: flag,
  wants_product_updates: flag,
  date_added: timestamp,
  date_optin: timestamp,
  date_last_changed: timestamp,
  notes: text,
  source: text,
  revenue: amount,
  street_1: text,
  street_2: text,
  city: text,
  state: text,
  zipcode: text,
  country: text,
  address_formatted: text,
  phone: text,
  tags: list,
  link_to_people: list,
  cio_company_id: companyId,
});

export type NewMailingListSubscriber = z.infer<typeof NewMailingListSubscriberSchema>;
export type MailingListSubscriber = Stored<NewMailingListSubscriber>;

/**
 * Linked people are set by hand in Airtable.
 */
export function keepLinkToPeople(fields: AirtableFields, existing: AirtableFields | null): AirtableFields {
  return { ...fields, link_to_people: existing?.link_to_people ?? [] };
}

export const MailingListSubscribers = defineRecord({
  name: "MailingListSubscriber",
  table: "mailing_list_subscribers",
  schema: NewMailingListSubscriberSchema,
  matchOn: ["email"],
  airtable: {
    base: "customer_leads",
    table: "Mailing List Signups",
    beforeUpdate: (_record, fields, { existing }) => keepLinkToPeople(fields, existing),
  },
});

export interface PostalAddress {
  street_1: string;
  street_2: string;
  city: string;
  state: string;
  zipcode: string;
  country: string;
}

function joinPresent(parts: string[], separator: string): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .join(separator);
}

/**
 * "street_1 street_2, city, state zip, country" without the empty parts
 */
export function formatAddress(address: PostalAddress): string {
  return joinPresent(
    [
      joinPresent([address.street_1, address.street_2], " "),
      address.city,
      joinPresent([address.state, address.zipcode], " "),
      address.country,
    ],
    ", "
  );
}

export function parseMailchimpTime(value: string): Date | null {
  if (value.trim() === "") {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export interface MemberDates {
  date_added: Date;
  date_optin: Date;
  date_last_changed: Date;
}

export function memberDates(member: mailchimp.Member, now: Date): MemberDates {
  const signup = parseMailchimpTime(member.timestamp_signup);
  const optin = parseMailchimpTime(member.timestamp_opt);
  const added = signup ?? optin ?? now;
  return {
    date_added: added,
    date_optin: optin ?? added,
    date_last_changed: parseMailchimpTime(member.last_changed) ?? added,
  };
}

export function memberAddress(member: mailchimp.Member): PostalAddress {
  const address = member.merge_fields.ADDRESS;
  if (address === undefined || typeof address === "string") {
    return { street_1: "", street_2: "", city: "", state: "", zipcode: "", country: "" };
  }
  return {
    street_1: address.addr1,
    street_2: address.addr2,
    city: address.city,
    state: address.state,
    zipcode: address.zip,
    country: address.country,
  };
}

export function mailingListSubscriberFromMember(
  member: mailchimp.Member,
  cioCompanyId: number,
  now: Date = new Date()
): NewMailingListSubscriber {
  const merge = member.merge_fields;
  const address = memberAddress(member);
  return {
    email: member.email_address.trim(),
    first_name: merge.FNAME,
    last_name: merge.LNAME,
    name: `${merge.FNAME} ${merge.LNAME}`.trim(),
    company: merge.COMPANY,
    interest: merge.INTEREST,
    wants_podcast_updates: member.interests[INTEREST_PODCAST] ?? false,
    wants_newsletter: member.interests[INTEREST_NEWSLETTER] ?? false,
    wants_product_updates: member.interests[INTEREST_PRODUCT] ?? false,
    ...memberDates(member, now),
    notes: member.last_note?.note ?? "",
    source: member.source,
    revenue: 0,
    ...address,
    address_formatted: formatAddress(address),
    phone: merge.PHONE,
    tags: member.tags.map((tag) => tag.name),
    link_to_people: [],
    cio_company_id: cioCompanyId,
  };
}

function groupSelected(groupings: mailchimp.WebhookGrouping[], index: number): boolean {
  return (groupings[index]?.groups ?? "").trim() !== "";
}

/**
 * Subscriber from a subscribe webhook; null when it carries no email.
 */
export function mailingListSubscriberFromWebhook(
  webhook: mailchimp.Webhook,
  cioCompanyId: number
): NewMailingListSubscriber | null {
  const merges = webhook.data.merges ?? {};
  const email = (merges.EMAIL ?? webhook.data.email ?? "").trim();
  if (email === "") {
    return null;
  }

  const firstName = (merges.FNAME ?? "").trim();
  const lastName = (merges.LNAME ?? "").trim();
  const groupings = merges.GROUPINGS ?? [];
  return {
    email,
    first_name: firstName,
    last_name: lastName,
    name: `${firstName} ${lastName}`.trim(),
    company: (merges.COMPANY ?? "").trim(),
    interest: (merges.INTEREST ?? "").trim(),
    wants_podcast_updates: groupSelected(groupings, 0),
    wants_newsletter: groupSelected(groupings, 1),
    wants_product_updates: groupSelected(groupings, 2),
    date_added: webhook.fired_at,
    date_optin: webhook.fired_at,
    date_last_changed: webhook.fired_at,
    notes: "",
    source: "",
    revenue: 0,
    street_1: "",
    street_2: "",
    city: "",
    state: "",
    zipcode: "",
    country: "",
    address_formatted: "",
    phone: (merges.PHONE ?? "").trim(),
    tags: [],
    link_to_people: [],
    cio_company_id: cioCompanyId,
  };
}
