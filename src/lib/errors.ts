export type NutrientRegistryErrorCode =
  | "REGISTRY_SCHEMA_INVALID"
  | "REGISTRY_DUPLICATE_KEY"
  | "REGISTRY_RANGE_INVALID";

export class NutrientRegistryError extends Error {
  code: NutrientRegistryErrorCode;
  nutrientKey: string | null;

  constructor(code: NutrientRegistryErrorCode, message: string, nutrientKey: string | null = null) {
    super(message);
    this.name = "NutrientRegistryError";
    this.code = code;
    this.nutrientKey = nutrientKey;
  }
}
