import type { IncomingHttpHeaders } from "node:http";

import type { Requester } from "../core/ownership.js";

export const USER_ID_HEADER = "x-user-id";
export const USER_ROLE_HEADER = "x-user-role";

// Identity is established upstream; these headers are trusted as given.
export function resolveRequester(headers: IncomingHttpHeaders): Requester | null {
  const id = firstHeaderValue(headers[USER_ID_HEADER])?.trim();
  if (!id) return null;

  const role = firstHeaderValue(headers[USER_ROLE_HEADER])?.trim().toLowerCase();
  return { id, isAdmin: role === "admin" };
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
