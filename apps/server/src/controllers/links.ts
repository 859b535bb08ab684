/**
 * Links controller
 *
 * POST stores a URL and answers with its short link.
 * GET resolves the last path segment and redirects to the stored URL.
 */

import { type ContentStore, isContentStoreError } from "@shortlink/content-store";
import { isValidIdentifier } from "@shortlink/storage-core";
import type { Context } from "hono";

export type LinksController = {
  resolve: (c: Context) => Promise<Response>;
  shorten: (c: Context) => Promise<Response>;
};

type LinksControllerDeps = {
  store: ContentStore;
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// Never valid inside a Location header
const HEADER_BREAKING = /[\r\n\u0000]/;
const SURROUNDING_C0_OR_SPACE = /^[\u0000-\u0020]+|[\u0000-\u0020]+$/g;

/**
 * Parse and re-serialize a URL. Empty string means the input is not a URL.
 *
 * Input the WHATWG parser rejects (e.g. "example.com/x", no scheme) is kept
 * as a relative reference with surrounding control characters and spaces
 * stripped, so only blank input comes out empty.
 */
export const normalizeUrl = (input: string): string => {
  if (HEADER_BREAKING.test(input)) {
    return "";
  }
  try {
    return new URL(input).href;
  } catch {
    return input.replace(SURROUNDING_C0_OR_SPACE, "");
  }
};

/**
 * Last `/`-separated segment of a request path
 */
export const identifierFromPath = (path: string): string => {
  return path.slice(path.lastIndexOf("/") + 1);
};

export const createLinksController = (deps: LinksControllerDeps): LinksController => {
  const { store } = deps;

  const notFound = (c: Context) => c.body(null, 404);

  return {
    resolve: async (c) => {
      const identifier = identifierFromPath(c.req.path);
      if (!isValidIdentifier(identifier, store.hashLength)) {
        return notFound(c);
      }

      try {
        const content = await store.load(identifier);
        return c.redirect(decoder.decode(content), 302);
      } catch (error) {
        if (isContentStoreError(error) && error.code === "NotFound") {
          return notFound(c);
        }
        throw error;
      }
    },

    shorten: async (c) => {
      const submitted = decoder.decode(await c.req.arrayBuffer());
      if (normalizeUrl(submitted) === "") {
        return c.text("Invalid URL", 400);
      }

      const identifier = await store.save(encoder.encode(submitted));
      const host = c.req.header("host") ?? new URL(c.req.url).host;
      return c.text(`http://${host}/${identifier}`, 200);
    },
  };
};
