/**
 * TripActions API Client
 *
 * Booking report for the travel log.
 * OAuth2 client credentials.
 */

import { z } from "zod";
import { ApiClient, bearer, type RetryOptions } from "../../lib/http-client.js";
import { clientCredentialsGrant, type AccessTokenSource, type ClientCredentials, type TokenGrant } from "../../lib/oauth.js";

export const TRIPACTIONS_API_BASE = "https://api.tripactions.com/v1/";
export const TRIPACTIONS_TOKEN_URL = "https://api.tripactions.com/ta-auth/oauth/token";
const DEFAULT_LOOKBACK_DAYS = 364;

export function tripactionsGrant(client: ClientCredentials): TokenGrant {
  return clientCredentialsGrant(TRIPACTIONS_TOKEN_URL, client, { service: "tripactions", clientAuth: "basic" });
}

// The booking report sends null for many empty strings
const text = z
  .string()
  .nullable()
  .optional()
  .transform((v) => v ?? "");

const amount = z
  .number()
  .nullable()
  .optional()
  .transform((v) => v ?? 0);

const PersonSchema = z
  .object({
    uuid: text,
    name: text,
    email: text,
    department: text,
  })
  .passthrough();

const PlaceSchema = z
  .object({
    country: text,
    state: text,
    city: text,
    airportCode: text,
  })
  .passthrough();

const emptyPlace = { country: "", state: "", city: "", airportCode: "" };

export const BookingSchema = z
  .object({
    uuid: z.string(),
    created: z.coerce.date(),
    lastModified: z.coerce.date(),
    bookingType: text,
    bookingStatus: text,
    bookingId: text,
    vendor: text,
    flight: text,
    cabin: text,
    preferredVendor: text,
    corporateDiscountUsed: text,
    cancelledAt: z.coerce.date().nullable().optional(),
    cancellationReason: text,
    startDate: z.string().nullable().optional(),
    endDate: z.string().nullable().optional(),
    passengers: z
      .array(z.object({ travelerType: text, status: text, person: PersonSchema.nullable().optional() }).passthrough())
      .default([]),
    booker: PersonSchema.nullable().optional(),
    origin: PlaceSchema.nullable()
      .optional()
      .transform((v) => v ?? emptyPlace),
    destination: PlaceSchema.nullable()
      .optional()
      .transform((v) => v ?? emptyPlace),
    tripLength: text,
    tripDescription: text,
    currency: text,
    optimalPrice: amount,
    grandTotal: amount,
    purpose: text,
    reason: text,
  })
  .passthrough();

export type Booking = z.infer<typeof BookingSchema>;

const BookingsPageSchema = z.object({
  data: z.array(BookingSchema),
  page: z
    .object({
      totalPages: z.number(),
      currentPage: z.number(),
      pageSize: z.number().optional(),
      totalElements: z.number().optional(),
    })
    .passthrough(),
});

export interface BookingWindow {
  createdFrom: Date;
  createdTo: Date;
}

export class TripActionsClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("tripactions", TRIPACTIONS_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * Bookings created in the window (default: the last 52 weeks).
   * Pages are zero-based; paging stops at `page.totalPages`.
   */
  async getBookings(window?: BookingWindow): Promise<Booking[]> {
    const createdTo = window?.createdTo ?? new Date();
    const createdFrom =
      window?.createdFrom ?? new Date(createdTo.getTime() - DEFAULT_LOOKBACK_DAYS * 24 * 60 * 60 * 1000);
    const query = {
      createdFrom: Math.floor(createdFrom.getTime() / 1000),
      createdTo: Math.floor(createdTo.getTime() / 1000),
    };

    const bookings: Booking[] = [];
    let page = 0;
    while (true) {
      const response = await this.getJson(BookingsPageSchema, "bookings", page === 0 ? query : { ...query, page });
      bookings.push(...response.data);
      page = response.page.currentPage + 1;
      if (page >= response.page.totalPages) {
        break;
      }
    }

    this.logger.debug(`Fetched ${bookings.length} bookings`);
    return bookings;
  }
}
