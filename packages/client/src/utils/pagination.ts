import { MAX_PAGES } from '../config.js';
import { ApiError, DecodeError } from '../errors/index.js';
import type { JsonObject, QueryParams, RawResponse } from '../types/common.js';
import { isSuccessStatus, toApiError } from './http.js';
import { decodeJsonObject } from './json.js';

/**
 * Envelope fields that describe a page rather than its payload
 */
export const PAGE_METADATA_FIELDS = ['errors', 'resume', 'total'] as const;

/**
 * Fetches one page with the given query
 */
export type PageFetcher = (query: QueryParams) => Promise<RawResponse>;

/**
 * Read the continuation token of a page
 * @returns the token, or undefined on the last page
 * @throws {DecodeError} if `resume` is neither a string nor null
 */
export function readResumeToken(page: JsonObject): string | undefined {
  const resume = page.resume;

  if (resume === undefined || resume === null || resume === '') {
    return undefined;
  }
  if (typeof resume !== 'string') {
    throw new DecodeError(
      `Expected "resume" to be a string, got ${JSON.stringify(resume)}`,
    );
  }

  return resume;
}

/**
 * Copy of a page without its envelope fields
 */
export function stripPageMetadata(page: JsonObject): JsonObject {
  const payload: JsonObject = { ...page };
  for (const field of PAGE_METADATA_FIELDS) {
    delete payload[field];
  }
  return payload;
}

/**
 * Merge a page into the accumulated result
 * Arrays present on both sides are concatenated in page order, any other
 * value from the page replaces the accumulated one
 */
export function mergePage(accumulated: JsonObject, page: JsonObject): JsonObject {
  for (const [key, value] of Object.entries(page)) {
    const existing = accumulated[key];

    if (Array.isArray(existing) && Array.isArray(value)) {
      for (const item of value) {
        existing.push(item);
      }
    } else {
      // Plain assignment would invoke the __proto__ setter
      Object.defineProperty(accumulated, key, {
        value,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
  }

  return accumulated;
}

/**
 * Strip a decoded page and merge it into the accumulated result
 * @throws {ApiError} if the accumulated result already carries `errors`
 */
export function absorbPage(
  accumulated: JsonObject,
  page: JsonObject,
  status: number,
): JsonObject {
  if (accumulated.errors !== undefined) {
    throw new ApiError(
      `Response returned errors: ${JSON.stringify(accumulated.errors)}`,
      { statusCode: status },
    );
  }

  return mergePage(accumulated, stripPageMetadata(page));
}

/**
 * Fetch pages until the cluster stops returning a resume token and merge
 * them into one object
 *
 * Continuation pages are requested with `{ resume }` as the whole query.
 * An empty body ends the call with `undefined`, dropping earlier pages.
 *
 * @throws {ApiError} for non-2xx responses (401 surfaces as AuthenticationError)
 * @throws {DecodeError} if a page is not a JSON object
 */
export async function collectPages(
  fetchPage: PageFetcher,
  query: QueryParams = {},
  maxPages = MAX_PAGES,
): Promise<JsonObject | undefined> {
  const merged: JsonObject = {};
  let resume: string | undefined;

  for (let count = 0; count < maxPages; count++) {
    const response = await fetchPage(resume === undefined ? query : { resume });

    if (!isSuccessStatus(response.status)) {
      throw toApiError(response);
    }
    if (response.body.byteLength === 0) {
      return undefined;
    }

    const page = decodeJsonObject(response.body);
    resume = readResumeToken(page);

    absorbPage(merged, page, response.status);

    if (resume === undefined) {
      break;
    }
  }

  return merged;
}
