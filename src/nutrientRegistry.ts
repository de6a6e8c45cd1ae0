import { z } from "zod";
import nutrientTable from "./data/nutrients.json";
import { NutrientRegistryError } from "./lib/errors";
import type { NutrientCategory, NutrientRegistry, NutrientSpec } from "./types";
import { normalizeLookupKey } from "./utils";

const NUTRIENT_CATEGORIES = [
  "vitamins",
  "minerals",
  "hematology",
  "metabolic",
  "lipids",
  "liver",
  "kidney",
  "thyroid",
  "inflammation",
  "hormones"
] as const satisfies readonly NutrientCategory[];

const rangeSchema = z.object({
  low: z.number().finite(),
  high: z.number().finite()
});

const nutrientEntrySchema = z.object({
  key: z.string().regex(/^[a-z][a-z0-9_]*$/, "Nutrient keys are lower snake case"),
  label: z.string().trim().min(1),
  category: z.enum(NUTRIENT_CATEGORIES),
  unit: z.string().trim().min(1),
  normalRange: rangeSchema,
  plausibleRange: rangeSchema,
  aliases: z.array(z.string().trim().min(1, "Aliases must not be empty"))
});

const nutrientTableSchema = z.array(nutrientEntrySchema).min(1, "The nutrient table is empty");

type NutrientEntry = z.infer<typeof nutrientEntrySchema>;

export const canonicalNameOf = (key: string): string => key.replace(/_/g, " ");

const assertRanges = (entry: NutrientEntry) => {
  const { normalRange, plausibleRange } = entry;
  if (normalRange.low > normalRange.high || plausibleRange.low > plausibleRange.high) {
    throw new NutrientRegistryError("REGISTRY_RANGE_INVALID", "range bounds are inverted", entry.key);
  }
  if (plausibleRange.low <= 0) {
    throw new NutrientRegistryError("REGISTRY_RANGE_INVALID", "plausible range must start above zero", entry.key);
  }
  if (plausibleRange.low > normalRange.low || plausibleRange.high < normalRange.high) {
    throw new NutrientRegistryError(
      "REGISTRY_RANGE_INVALID",
      "plausible range must contain the normal range",
      entry.key
    );
  }
};

/**
 * Validates a raw nutrient table and freezes it into a lookup structure.
 *
 * Structural problems, duplicate keys and inconsistent ranges throw a
 * `NutrientRegistryError`. An alias claimed by two nutrients stays with the
 * first one and only produces a warning.
 */
export const buildNutrientRegistry = (table: unknown): NutrientRegistry => {
  const parsed = nutrientTableSchema.safeParse(table);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const index = typeof issue?.path[0] === "number" ? issue.path[0] : null;
    const rawEntry: unknown = index !== null && Array.isArray(table) ? table[index] : null;
    const rawKey =
      rawEntry && typeof rawEntry === "object" && "key" in rawEntry && typeof rawEntry.key === "string"
        ? rawEntry.key
        : null;
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new NutrientRegistryError("REGISTRY_SCHEMA_INVALID", `${where}${issue?.message ?? "invalid table"}`, rawKey);
  }

  const byKey = new Map<string, NutrientSpec>();
  const aliasLookup = new Map<string, string>();
  const ordered: NutrientSpec[] = [];

  for (const entry of parsed.data) {
    if (byKey.has(entry.key)) {
      throw new NutrientRegistryError("REGISTRY_DUPLICATE_KEY", `duplicate nutrient key "${entry.key}"`, entry.key);
    }
    assertRanges(entry);

    const aliases: string[] = [];
    const ownNormalized = new Set<string>();
    for (const alias of entry.aliases) {
      const normalized = normalizeLookupKey(alias);
      if (!normalized || ownNormalized.has(normalized)) {
        continue;
      }
      const owner = aliasLookup.get(normalized);
      if (owner && owner !== entry.key) {
        console.warn(`Alias "${alias}" is registered for both ${owner} and ${entry.key}; keeping ${owner}.`);
        continue;
      }
      ownNormalized.add(normalized);
      aliasLookup.set(normalized, entry.key);
      aliases.push(alias.trim().toLowerCase());
    }

    for (const name of [canonicalNameOf(entry.key), entry.label]) {
      const normalized = normalizeLookupKey(name);
      if (normalized && !aliasLookup.has(normalized)) {
        aliasLookup.set(normalized, entry.key);
      }
    }

    const spec: NutrientSpec = Object.freeze({
      key: entry.key,
      label: entry.label,
      category: entry.category,
      unit: entry.unit,
      normalRange: Object.freeze({ ...entry.normalRange }),
      plausibleRange: Object.freeze({ ...entry.plausibleRange }),
      aliases: Object.freeze(aliases)
    });
    byKey.set(spec.key, spec);
    ordered.push(spec);
  }

  const all = Object.freeze(ordered);

  return Object.freeze({
    lookup: (key: string) => byKey.get(key),
    all: () => all,
    resolveAlias: (name: string) => {
      const owner = aliasLookup.get(normalizeLookupKey(name));
      return owner ? byKey.get(owner) : undefined;
    },
    aliasesOf: (key: string) => byKey.get(key)?.aliases ?? []
  });
};

export const NUTRIENT_REGISTRY: NutrientRegistry = buildNutrientRegistry(nutrientTable);
