/**
 * Travel bookings from TripActions
 */

import { z } from "zod";
import { defineRecord, type Stored, type tripactions } from "@cio/connector";
import { amount, companyId, flag, list, optionalTimestamp, text, timestamp } from "./fields.js";

export const NewBookingSchema = z.object({
  booking_id: z.string(),
  created_at: timestamp,
  last_modified_at: timestamp,
  cancelled_at: optionalTimestamp,
  type: text,
  status: text,
  vendor: text,
  flight: text,
  cabin: text,
  is_preferred_vendor: flag,
  used_corporate_discount: flag,
  start_date: text,
  end_date: text,
  passengers: list,
  booker: text,
  origin: text,
  destination: text,
  length: text,
  description: text,
  currency: text,
  optimal_price: amount,
  grand_total: amount,
  purpose: text,
  reason: text,
  confirmation_id: text,
  cio_company_id: companyId,
});

export type NewBooking = z.infer<typeof NewBookingSchema>;
export type BookingRecord = Stored<NewBooking>;

export const Bookings = defineRecord({
  name: "Booking",
  table: "bookings",
  schema: NewBookingSchema,
  matchOn: ["cio_company_id", "booking_id"],
  airtable: {
    base: "travel",
    table: "Bookings",
  },
});

export function bookingFromTripActions(booking: tripactions.Booking, cioCompanyId: number): NewBooking {
  return {
    booking_id: booking.uuid,
    created_at: booking.created,
    last_modified_at: booking.lastModified,
    cancelled_at: booking.cancelledAt ?? null,
    type: booking.bookingType,
    status: booking.bookingStatus,
    vendor: booking.vendor,
    flight: booking.flight,
    cabin: booking.cabin,
    is_preferred_vendor: booking.preferredVendor === "Y",
    used_corporate_discount: booking.corporateDiscountUsed === "Y",
    start_date: booking.startDate ?? "",
    end_date: booking.endDate ?? "",
    passengers: booking.passengers.map((p) => p.person?.email ?? "").filter((email) => email !== ""),
    booker: booking.booker?.email ?? "",
    origin: booking.origin.airportCode,
    destination: booking.destination.airportCode,
    length: booking.tripLength,
    description: booking.tripDescription,
    currency: booking.currency,
    optimal_price: booking.optimalPrice,
    grand_total: booking.grandTotal,
    purpose: booking.purpose,
    reason: booking.reason,
    confirmation_id: booking.bookingId,
    cio_company_id: cioCompanyId,
  };
}
