import { NutrientRegistryError } from "./errors";

export const mapRegistryErrorToMessage = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return "The nutrient catalogue could not be loaded.";
  }

  if (!(error instanceof NutrientRegistryError)) {
    return error.message || "The nutrient catalogue could not be loaded.";
  }

  const subject = error.nutrientKey ? ` (${error.nutrientKey})` : "";
  if (error.code === "REGISTRY_SCHEMA_INVALID") {
    return `The nutrient catalogue has a malformed entry${subject}: ${error.message}`;
  }
  if (error.code === "REGISTRY_DUPLICATE_KEY") {
    return `The nutrient catalogue lists the same nutrient twice${subject}.`;
  }
  return `The nutrient catalogue has inconsistent ranges${subject}: ${error.message}`;
};
