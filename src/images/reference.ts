import type { SwrConfig } from "../config/schema";

function looksLikeHost(segment: string): boolean {
  return segment.includes(".") || segment.includes(":");
}

/**
 * Repository name and tag of a loaded reference, without its registry host
 * and the namespace that follows it.
 *
 *   registry.example.com/ns/app:1.0 → app:1.0
 *   localhost:5000/app:1.0          → app:1.0
 *   library/app:latest              → app:latest
 */
export function stripRegistry(loadedRef: string): string {
  const parts = loadedRef.split("/");
  const head = parts[0] ?? "";

  if (parts.length >= 2 && looksLikeHost(head)) {
    return parts.length > 2 ? parts.slice(2).join("/") : parts[1] ?? "";
  }
  return parts[parts.length - 1] ?? "";
}

export function buildTargetRef(swr: SwrConfig, loadedRef: string): string {
  return `${swr.endpoint}/${swr.org}/${stripRegistry(loadedRef)}`;
}
