/**
 * Finance sync
 *
 * Ramp card transactions and QuickBooks bill payments into the finance
 * base.
 */

import { RecordStore, setupLogger, upsertRawBatch } from "@cio/connector";
import {
  AccountsPayables,
  CreditCardTransactions,
  accountsPayableFromBillPayment,
  paidBillIds,
  transactionFromRamp,
} from "../records/finance.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-finance");

export async function syncCreditCardTransactions(ctx: JobContext): Promise<number> {
  const ramp = await ctx.clients.ramp();
  const users = await ramp.listUsers();
  const emails = new Map(users.map((user) => [user.id, user.email]));

  const transactions = await ramp.listTransactions();
  await upsertRawBatch(
    "ramp__transactions",
    transactions.map((t) => ({ sourceId: t.id, data: t })),
    "developer/v1",
    1000,
    ctx.db
  );

  const store = new RecordStore(CreditCardTransactions, ctx.db);
  for (const transaction of transactions) {
    await store.upsert(transactionFromRamp(transaction, emails, ctx.company.id));
  }
  logger.info(`Synced ${transactions.length} Ramp transactions`);

  await mirrorToAirtable(ctx, CreditCardTransactions);
  return transactions.length;
}

export async function syncAccountsPayable(ctx: JobContext): Promise<number> {
  const quickbooks = await ctx.clients.quickbooks();
  const payments = await quickbooks.listBillPayments();

  const store = new RecordStore(AccountsPayables, ctx.db);
  for (const payment of payments) {
    const invoices: string[] = [];
    for (const billId of paidBillIds(payment)) {
      const attachments = await quickbooks.getAttachmentsForEntity("Bill", billId);
      invoices.push(...attachments.map((a) => a.TempDownloadUri).filter((uri) => uri !== ""));
    }
    await store.upsert(accountsPayableFromBillPayment(payment, invoices, ctx.company.id));
  }
  logger.info(`Synced ${payments.length} QuickBooks bill payments`);

  await mirrorToAirtable(ctx, AccountsPayables);
  return payments.length;
}

export async function syncFinance(ctx: JobContext): Promise<void> {
  await syncCreditCardTransactions(ctx);
  await syncAccountsPayable(ctx);
}
