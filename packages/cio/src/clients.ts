/**
 * API clients of a company
 *
 * OAuth products keep their tokens in api_tokens through ApiTokenStore;
 * client-credential products fetch a fresh token per session and store it
 * too, so the token table shows every integration.
 */

import {
  OAuthSession,
  airtable,
  checkr,
  googleAuth,
  googleDirectory,
  googleDrive,
  gusto,
  mailchimp,
  quickbooks,
  ramp,
  requireConfig,
  tripactions,
  zoho,
  zoom,
  type AccessTokenSource,
  type Queryable,
  type TokenGrant,
} from "@cio/connector";
import type { Company } from "./records/companies.js";
import { ApiTokenStore } from "./token-store.js";

export interface Clients {
  airtableEnterprise(): Promise<airtable.AirtableClient>;
  checkr(): Promise<checkr.CheckrClient>;
  googleDirectory(): Promise<googleDirectory.GoogleDirectoryClient>;
  googleDrive(): Promise<googleDrive.GoogleDriveClient>;
  gusto(): Promise<gusto.GustoClient>;
  mailchimp(): Promise<mailchimp.MailchimpClient>;
  quickbooks(): Promise<quickbooks.QuickBooksClient>;
  ramp(): Promise<ramp.RampClient>;
  tripactions(): Promise<tripactions.TripActionsClient>;
  zoho(): Promise<zoho.ZohoClient>;
  zoom(): Promise<zoom.ZoomClient>;
}

// =============================================================================
// OAuth app settings
// =============================================================================

export function gustoOAuth(): gusto.GustoOAuthConfig {
  return {
    clientId: requireConfig("GUSTO_CLIENT_ID"),
    clientSecret: requireConfig("GUSTO_CLIENT_SECRET"),
    redirectUri: requireConfig("GUSTO_REDIRECT_URI"),
  };
}

export function mailchimpOAuth(): mailchimp.MailchimpOAuthConfig {
  return {
    clientId: requireConfig("MAILCHIMP_CLIENT_ID"),
    clientSecret: requireConfig("MAILCHIMP_CLIENT_SECRET"),
    redirectUri: requireConfig("MAILCHIMP_REDIRECT_URI"),
  };
}

export function quickbooksOAuth(): quickbooks.QuickBooksOAuthConfig {
  return {
    clientId: requireConfig("QUICKBOOKS_CLIENT_ID"),
    clientSecret: requireConfig("QUICKBOOKS_CLIENT_SECRET"),
    redirectUri: requireConfig("QUICKBOOKS_REDIRECT_URI"),
  };
}

export function googleOAuth(): googleAuth.GoogleOAuthConfig {
  return {
    clientId: requireConfig("GOOGLE_CLIENT_ID"),
    clientSecret: requireConfig("GOOGLE_CLIENT_SECRET"),
    redirectUri: requireConfig("GOOGLE_REDIRECT_URI"),
  };
}

export function zohoOAuth(): zoho.ZohoOAuthConfig {
  return {
    clientId: requireConfig("ZOHO_CLIENT_ID"),
    clientSecret: requireConfig("ZOHO_CLIENT_SECRET"),
    redirectUri: requireConfig("ZOHO_REDIRECT_URI"),
  };
}

export const REFRESHABLE_PRODUCTS = ["gusto", "quickbooks", "google", "zoho"] as const;

export type RefreshableProduct = (typeof REFRESHABLE_PRODUCTS)[number];

export function isRefreshableProduct(product: string): product is RefreshableProduct {
  return (REFRESHABLE_PRODUCTS as readonly string[]).includes(product);
}

/**
 * Refresh-token grants, built on first use so missing settings only fail
 * the product that needs them.
 */
export function refreshGrants(): Record<RefreshableProduct, () => TokenGrant> {
  return {
    gusto: () => gusto.gustoRefreshGrant(gustoOAuth()),
    quickbooks: () => quickbooks.quickbooksRefreshGrant(quickbooksOAuth()),
    google: () => googleAuth.googleRefreshGrant(googleOAuth()),
    zoho: () => zoho.zohoRefreshGrant(zohoOAuth()),
  };
}

// =============================================================================
// Clients
// =============================================================================

export function createClients(db: Queryable, company: Company): Clients {
  const tokens = new ApiTokenStore(db, company);
  const grants = refreshGrants();
  const sessions = new Map<string, OAuthSession>();

  const session = (product: string, grant: () => TokenGrant): OAuthSession => {
    let current = sessions.get(product);
    if (current === undefined) {
      current = new OAuthSession({ product, grant: grant(), store: tokens });
      sessions.set(product, current);
    }
    return current;
  };

  const stored = async (product: string) => {
    const token = await tokens.get(product);
    if (token === null || token.access_token === "") {
      throw new Error(`${company.name} has no ${product} token, complete the consent flow first`);
    }
    return token;
  };

  const googleSession = (): AccessTokenSource => session("google", grants.google);

  return {
    airtableEnterprise: async () =>
      new airtable.AirtableClient({
        apiKey: requireConfig("AIRTABLE_API_KEY"),
        baseId: company.airtable_base_id_cio,
        enterpriseAccountId: requireConfig("AIRTABLE_ENTERPRISE_ACCOUNT_ID"),
      }),

    checkr: async () => new checkr.CheckrClient(company.checkr_api_key || requireConfig("CHECKR_API_KEY")),

    googleDirectory: async () => new googleDirectory.GoogleDirectoryClient(googleSession()),

    googleDrive: async () => new googleDrive.GoogleDriveClient(googleSession()),

    gusto: async () => new gusto.GustoClient(session("gusto", grants.gusto)),

    // MailChimp tokens do not expire and cannot be refreshed
    mailchimp: async () => {
      const token = await stored("mailchimp");
      const source: AccessTokenSource = { accessToken: async () => token.access_token };
      return token.endpoint ? new mailchimp.MailchimpClient(source, token.endpoint) : mailchimp.MailchimpClient.connect(source);
    },

    quickbooks: async () => {
      const token = await stored("quickbooks");
      if (token.company_id === "") {
        throw new Error(`${company.name} quickbooks token has no realm id`);
      }
      return new quickbooks.QuickBooksClient(session("quickbooks", grants.quickbooks), token.company_id);
    },

    ramp: async () =>
      new ramp.RampClient(
        session("ramp", () =>
          ramp.rampGrant({ clientId: requireConfig("RAMP_CLIENT_ID"), clientSecret: requireConfig("RAMP_CLIENT_SECRET") })
        )
      ),

    tripactions: async () =>
      new tripactions.TripActionsClient(
        session("tripactions", () =>
          tripactions.tripactionsGrant({
            clientId: requireConfig("TRIPACTIONS_CLIENT_ID"),
            clientSecret: requireConfig("TRIPACTIONS_CLIENT_SECRET"),
          })
        )
      ),

    zoho: async () => new zoho.ZohoClient(session("zoho", grants.zoho)),

    zoom: async () =>
      new zoom.ZoomClient(
        session("zoom", () =>
          zoom.zoomGrant(requireConfig("ZOOM_ACCOUNT_ID"), {
            clientId: requireConfig("ZOOM_CLIENT_ID"),
            clientSecret: requireConfig("ZOOM_CLIENT_SECRET"),
          })
        )
      ),
  };
}

/** Google Workspace domain of the company */
export function googleDomain(company: Company): string {
  const domain = company.gsuite_domain || company.domain;
  if (domain === "") {
    throw new Error(`Company ${company.name} has no Google Workspace domain`);
  }
  return domain;
}
