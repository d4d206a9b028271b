/**
 * Consent and code exchange for the products connected through OAuth
 */

import { googleAuth, gusto, mailchimp, quickbooks, zoho, type TokenSet } from "@cio/connector";
import { googleOAuth, gustoOAuth, mailchimpOAuth, quickbooksOAuth, zohoOAuth } from "../clients.js";
import type { TokenDetails } from "../token-store.js";

export const OAUTH_PRODUCTS = ["gusto", "mailchimp", "quickbooks", "google", "zoho"] as const;

export type OAuthProduct = (typeof OAUTH_PRODUCTS)[number];

export function isOAuthProduct(product: string): product is OAuthProduct {
  return (OAUTH_PRODUCTS as readonly string[]).includes(product);
}

export interface ExchangedTokens {
  tokens: TokenSet;
  details: TokenDetails;
}

export interface OAuthFlow {
  consentUrl(): string;
  /** Trade the callback code for tokens; params are the callback's query */
  exchange(code: string, params: Record<string, string>): Promise<ExchangedTokens>;
}

export type OAuthFlows = Record<OAuthProduct, OAuthFlow>;

export function oauthFlows(): OAuthFlows {
  return {
    gusto: {
      consentUrl: () => gusto.gustoConsentUrl(gustoOAuth()),
      exchange: async (code) => ({ tokens: await gusto.gustoExchangeCode(gustoOAuth(), code), details: {} }),
    },

    // The token is bound to a data center, which only the metadata endpoint knows
    mailchimp: {
      consentUrl: () => mailchimp.mailchimpConsentUrl(mailchimpOAuth()),
      exchange: async (code) => {
        const tokens = await mailchimp.mailchimpExchangeCode(mailchimpOAuth(), code);
        const metadata = await mailchimp.mailchimpMetadata(tokens.accessToken);
        return { tokens, details: { endpoint: metadata.api_endpoint } };
      },
    },

    quickbooks: {
      consentUrl: () => quickbooks.quickbooksConsentUrl(quickbooksOAuth()),
      exchange: async (code, params) => ({
        tokens: await quickbooks.quickbooksExchangeCode(quickbooksOAuth(), code),
        details: params.realmId ? { company_id: params.realmId } : {},
      }),
    },

    google: {
      consentUrl: () => googleAuth.googleConsentUrl(googleOAuth()),
      exchange: async (code) => ({ tokens: await googleAuth.googleExchangeCode(googleOAuth(), code), details: {} }),
    },

    zoho: {
      consentUrl: () => zoho.zohoConsentUrl(zohoOAuth()),
      exchange: async (code) => ({ tokens: await zoho.zohoExchangeCode(zohoOAuth(), code), details: {} }),
    },
  };
}
