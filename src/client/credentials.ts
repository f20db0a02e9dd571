/**
 * Credentials normalization
 *
 * Callers may pass a Credentials value, a camelCase pair or the wire-style
 * consumer_key/access_token map. Everything past the client constructor only
 * sees the frozen Credentials value built here.
 */

import { z } from "zod";
import { DEFAULT_SITE_BASE_URL, type Credentials } from "./types.js";
import { PocketConfigError } from "../utils/errors.js";

// Keys are sent verbatim; only blank values are rejected.
const keySchema = z.string().refine((value) => value.trim().length > 0, "must not be blank");
const siteSchema = z.string().url().optional();

const camelCaseSchema = z.object({
  consumerKey: keySchema,
  accessToken: keySchema,
  siteBaseUrl: siteSchema,
});

const wireSchema = z
  .object({
    consumer_key: keySchema,
    access_token: keySchema,
    site: siteSchema,
  })
  .transform(({ consumer_key, access_token, site }) => ({
    consumerKey: consumer_key,
    accessToken: access_token,
    siteBaseUrl: site,
  }));

export const credentialsInputSchema = z.union([camelCaseSchema, wireSchema]);

export type CredentialsInput = z.input<typeof credentialsInputSchema>;

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? stripTrailingSlash(url.slice(0, -1)) : url;
}

/**
 * Validate and freeze credentials
 *
 * @throws PocketConfigError when a key is missing or blank
 */
export function createCredentials(input: CredentialsInput | Credentials): Credentials {
  const parsed = credentialsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new PocketConfigError(
      "Invalid Pocket credentials: consumer key and access token are required",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "credentials"}: ${issue.message}`)
    );
  }

  const { consumerKey, accessToken, siteBaseUrl } = parsed.data;
  return Object.freeze({
    consumerKey,
    accessToken,
    siteBaseUrl: stripTrailingSlash(siteBaseUrl ?? DEFAULT_SITE_BASE_URL),
  });
}
