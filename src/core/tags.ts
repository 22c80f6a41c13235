import type { Tag } from "@aws-sdk/client-ecs";

import { DefinitionError } from "./errors.js";

/**
 * Parse `Key=Value,Key2=Value2` into ECS tags. Blank entries are skipped;
 * values may contain `=`.
 */
export function parseTags(input: string | undefined): Tag[] {
  if (!input) return [];

  const tags: Tag[] = [];
  for (const raw of input.split(",")) {
    const entry = raw.trim();
    if (entry.length === 0) continue;

    const idx = entry.indexOf("=");
    if (idx < 0) {
      throw new DefinitionError(`invalid tag format: ${entry} (expected Key=Value)`);
    }

    const key = entry.slice(0, idx);
    if (key.length === 0) {
      throw new DefinitionError(`invalid tag format: ${entry} (empty key)`);
    }

    tags.push({ key, value: entry.slice(idx + 1) });
  }

  return tags;
}
