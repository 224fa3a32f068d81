import type { ObjectScrapeDescriptor } from "lib/metrics/types.js";

/**
 * Looks the extracted value up in the descriptor's remap table for its value path.
 * Misses return the value exactly as extracted.
 */
export function convertValue(
  descriptor: Pick<ObjectScrapeDescriptor, "valuePath" | "valueConverter">,
  value: string
): string {
  const mappings = descriptor.valueConverter?.get(descriptor.valuePath);
  if (!mappings) {
    return value;
  }
  return mappings.get(value.toLowerCase()) ?? value;
}
