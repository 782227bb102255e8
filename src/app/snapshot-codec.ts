// Snapshot persistence: conversion to and from the stored JSON text.
// Storage itself (files, databases) belongs to the caller.

import {
  parseSnapshot,
  type GameSnapshot,
  type ParseResult,
} from "../engine/snapshot";

export function encodeSnapshot(snapshot: GameSnapshot): string {
  return JSON.stringify(snapshot);
}

// Stored text may predate the version field; those saves are version 1
function migrate(u: unknown): unknown {
  if (typeof u !== "object" || u === null || Array.isArray(u)) return u;
  if (!("version" in u)) return { ...u, version: 1 };
  return u;
}

/**
 * Decode stored text into a validated snapshot. Never throws.
 */
export function decodeSnapshot(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `invalid JSON: ${detail}` };
  }
  return parseSnapshot(migrate(parsed));
}
