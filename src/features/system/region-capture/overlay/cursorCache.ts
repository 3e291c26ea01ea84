import type { CursorIdentity } from "./RegionCaptureOverlayTypes";
import { CURSOR_IDENTITIES } from "./RegionCaptureOverlayConstants";

export type CursorCache<T> = {
  get: (identity: CursorIdentity) => T;
};

/** Resolves every cursor identity once, up front. */
export function createCursorCache<T>(resolve: (identity: CursorIdentity) => T): CursorCache<T> {
  const entries = new Map<CursorIdentity, T>();
  for (const identity of CURSOR_IDENTITIES) {
    entries.set(identity, resolve(identity));
  }
  return {
    get: (identity) => {
      const cached = entries.get(identity);
      if (cached !== undefined) {
        return cached;
      }
      const resolved = resolve(identity);
      entries.set(identity, resolved);
      return resolved;
    }
  };
}

export function createCssCursorCache(): CursorCache<string> {
  return createCursorCache((identity) => identity);
}
