/**
 * TripActions bookings into the travel base
 */

import { RecordStore, setupLogger, upsertRawBatch } from "@cio/connector";
import { Bookings, bookingFromTripActions } from "../records/bookings.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-travel");

export async function syncTravel(ctx: JobContext): Promise<number> {
  const tripactions = await ctx.clients.tripactions();
  const bookings = await tripactions.getBookings({
    createdFrom: new Date(ctx.now().getTime() - 52 * 7 * 24 * 60 * 60 * 1000),
    createdTo: ctx.now(),
  });

  await upsertRawBatch(
    "tripactions__bookings",
    bookings.map((b) => ({ sourceId: b.uuid, data: b })),
    "v1",
    1000,
    ctx.db
  );

  const store = new RecordStore(Bookings, ctx.db);
  for (const booking of bookings) {
    await store.upsert(bookingFromTripActions(booking, ctx.company.id));
  }
  logger.info(`Synced ${bookings.length} TripActions bookings`);

  await mirrorToAirtable(ctx, Bookings);
  return bookings.length;
}
