/**
 * infiniview/core - Page Token Registry
 * Maps page tokens to keys. Tokens are allocated lazily and never reused,
 * so a stale token can never resolve to a different key.
 */

import type { KeyLike, PageToken } from "../types";
import { PAGE_TOKEN_PREFIX } from "../constants";

export interface TokenRegistry<K extends KeyLike> {
  /** Allocate a fresh token for key */
  allocate(key: K): PageToken;

  /** Key of a live token, or undefined if the token was released */
  resolve(token: PageToken): K | undefined;

  /** Invalidate every token not in keep. Returns the released tokens. */
  retain(keep: ReadonlySet<PageToken>): PageToken[];
}

let registryInstanceId = 0;

export const createTokenRegistry = <K extends KeyLike>(
  prefix = PAGE_TOKEN_PREFIX,
): TokenRegistry<K> => {
  const keys = new Map<PageToken, K>();
  const namespace = `${prefix}-${registryInstanceId++}`;
  let counter = 0;

  return {
    allocate(key: K): PageToken {
      const token = `${namespace}-${counter++}`;
      keys.set(token, key);
      return token;
    },
    resolve: (token) => keys.get(token),
    retain(keep: ReadonlySet<PageToken>): PageToken[] {
      const released: PageToken[] = [];
      for (const token of keys.keys()) {
        if (!keep.has(token)) released.push(token);
      }
      for (const token of released) keys.delete(token);
      return released;
    },
  };
};
