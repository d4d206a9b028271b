/**
 * Finance
 *
 * Card transactions (Ramp), bill payments (QuickBooks) and the software
 * vendors the company pays for.
 */

import { z } from "zod";
import { defineRecord, type Stored, type quickbooks, type ramp } from "@cio/connector";
import { amount, companyId, count, flag, list, optionalTimestamp, text } from "./fields.js";

// =============================================================================
// Credit card transactions
// =============================================================================

export const NewCreditCardTransactionSchema = z.object({
  transaction_id: z.string(),
  card_vendor: text,
  card_id: text,
  employee_email: text,
  amount: amount,
  merchant_id: text,
  merchant_name: text,
  category_id: text,
  category_name: text,
  state: text,
  time: optionalTimestamp,
  memo: text,
  receipts: list,
  cio_company_id: companyId,
});

export type NewCreditCardTransaction = z.infer<typeof NewCreditCardTransactionSchema>;

export const CreditCardTransactions = defineRecord({
  name: "CreditCardTransaction",
  table: "credit_card_transactions",
  schema: NewCreditCardTransactionSchema,
  matchOn: ["cio_company_id", "transaction_id"],
  airtable: {
    base: "finance",
    table: "Credit Card Transactions",
  },
});

/**
 * @param emails - Ramp user id to email
 */
export function transactionFromRamp(
  transaction: ramp.Transaction,
  emails: Map<string, string>,
  cioCompanyId: number
): NewCreditCardTransaction {
  return {
    transaction_id: transaction.id,
    card_vendor: "Ramp",
    card_id: transaction.card_id,
    employee_email: emails.get(transaction.card_holder.user_id) ?? "",
    amount: transaction.amount,
    merchant_id: transaction.merchant_id,
    merchant_name: transaction.merchant_name,
    category_id: transaction.sk_category_id == null ? "" : String(transaction.sk_category_id),
    category_name: transaction.sk_category_name,
    state: transaction.state,
    time: transaction.user_transaction_time ?? null,
    memo: transaction.memo,
    receipts: transaction.receipts,
    cio_company_id: cioCompanyId,
  };
}

// =============================================================================
// Accounts payable
// =============================================================================

export const NewAccountsPayableSchema = z.object({
  confirmation_number: z.string(),
  vendor: text,
  amount: amount,
  currency: text,
  date: text,
  payment_type: text,
  account: text,
  notes: text,
  invoices: list,
  cio_company_id: companyId,
});

export type NewAccountsPayable = z.infer<typeof NewAccountsPayableSchema>;

export const AccountsPayables = defineRecord({
  name: "AccountsPayable",
  table: "accounts_payables",
  schema: NewAccountsPayableSchema,
  matchOn: ["cio_company_id", "confirmation_number"],
  airtable: {
    base: "finance",
    table: "Accounts Payable",
  },
});

/**
 * @param invoices - download links of the paid bills' attachments
 */
export function accountsPayableFromBillPayment(
  payment: quickbooks.BillPayment,
  invoices: string[],
  cioCompanyId: number
): NewAccountsPayable {
  return {
    confirmation_number: payment.DocNumber || payment.Id,
    vendor: payment.VendorRef?.name ?? "",
    amount: payment.TotalAmt,
    currency: "USD",
    date: payment.TxnDate,
    payment_type: payment.PayType,
    account: payment.CheckPayment?.BankAccountRef?.name ?? payment.CreditCardPayment?.CCAccountRef?.name ?? "",
    notes: payment.PrivateNote,
    invoices,
    cio_company_id: cioCompanyId,
  };
}

/** Bill ids a payment settles */
export function paidBillIds(payment: quickbooks.BillPayment): string[] {
  return payment.Line.flatMap((line) => line.LinkedTxn.filter((txn) => txn.TxnType === "Bill").map((txn) => txn.TxnId));
}

// =============================================================================
// Software vendors
// =============================================================================

export const NewSoftwareVendorSchema = z.object({
  name: z.string(),
  status: text,
  description: text,
  website: text,
  has_okta_integration: flag,
  used_purely_for_api: flag,
  pay_as_you_go: flag,
  pay_as_you_go_pricing_description: text,
  software_licenses: flag,
  cost_per_user_per_month: amount,
  users: count,
  flat_cost_per_month: amount,
  total_cost_per_month: amount,
  groups: list,
  cio_company_id: companyId,
});

export type NewSoftwareVendor = z.infer<typeof NewSoftwareVendorSchema>;
export type SoftwareVendor = Stored<NewSoftwareVendor>;

export const SoftwareVendors = defineRecord({
  name: "SoftwareVendor",
  table: "software_vendors",
  schema: NewSoftwareVendorSchema,
  matchOn: ["cio_company_id", "name"],
  airtable: {
    base: "finance",
    table: "Vendors",
  },
});

export function totalCostPerMonth(vendor: Pick<NewSoftwareVendor, "cost_per_user_per_month" | "users" | "flat_cost_per_month">): number {
  return vendor.cost_per_user_per_month * vendor.users + vendor.flat_cost_per_month;
}
