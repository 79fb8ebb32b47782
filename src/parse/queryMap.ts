import type { QueryMap } from "./decodeUrlEncoded";

export function getFirst(params: QueryMap, key: string): string | null {
  return params.get(key)?.[0] ?? null;
}

export function getAll(params: QueryMap, key: string): string[] {
  return [...(params.get(key) ?? [])];
}

export function toJSON(params: QueryMap): Record<string, string[]> {
  return Object.fromEntries(params);
}
