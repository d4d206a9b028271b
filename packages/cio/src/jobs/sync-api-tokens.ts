/**
 * Renew expiring OAuth tokens and mirror the token table.
 */

import { RecordStore, errorMessage, setupLogger, type TokenGrant } from "@cio/connector";
import { isRefreshableProduct, refreshGrants, type RefreshableProduct } from "../clients.js";
import { ApiTokens, isExpired } from "../records/api-tokens.js";
import { ApiTokenStore, tokenSetFrom } from "../token-store.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-api-tokens");

export interface RefreshTokensOptions {
  grants?: Partial<Record<RefreshableProduct, TokenGrant>>;
}

export async function syncApiTokens(ctx: JobContext, options: RefreshTokensOptions = {}): Promise<void> {
  const tokens = await new RecordStore(ApiTokens, ctx.db).select({ auth_company_id: ctx.company.id });
  const tokenStore = new ApiTokenStore(ctx.db, ctx.company, ctx.now);
  const factories = refreshGrants();
  let refreshed = 0;

  for (const token of tokens) {
    if (!isRefreshableProduct(token.product) || token.refresh_token === "") {
      continue;
    }
    if (!isExpired(token, ctx.now())) {
      logger.debug(`${token.product} token is still valid`);
      continue;
    }

    try {
      const grant = options.grants?.[token.product] ?? factories[token.product]();
      const renewed = await grant(tokenSetFrom(token));
      await tokenStore.save(token.product, renewed);
      refreshed++;
    } catch (error) {
      logger.warn(`Refreshing ${token.product} token failed: ${errorMessage(error)}`);
    }
  }

  logger.info(`Refreshed ${refreshed} of ${tokens.length} API tokens`, { company: ctx.company.name });
  await mirrorToAirtable(ctx, ApiTokens);
}
