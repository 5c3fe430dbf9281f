import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, ValidateFunction, Options } from "ajv";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { JsonObject } from "../core/types.js";
import type { MusweepConfig } from "./types.js";

const schemaDir = join(dirname(fileURLToPath(import.meta.url)), "../../schemas");

const loadSchema = (fileName: string): unknown => {
  const raw = readFileSync(join(schemaDir, fileName), "utf8");
  return JSON.parse(raw) as unknown;
};

type AjvInstance = {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => AjvInstance;

const applyFormats = addFormats as unknown as (instance: unknown) => void;

const createAjv = (): AjvInstance => {
  const ajv = new Ajv2020Ctor({
    allErrors: true,
    strict: true,
    allowUnionTypes: true,
    validateSchema: true
  });
  applyFormats(ajv);
  return ajv;
};

const ajv = createAjv();

export const validateConfig: ValidateFunction<MusweepConfig> = ajv.compile(
  loadSchema("config.schema.json")
);

export const compilePayloadSchema = (schema: JsonObject): ValidateFunction<JsonObject> =>
  ajv.compile<JsonObject>(schema);

export const formatAjvErrors = (
  schemaName: string,
  errors: ErrorObject[] | null | undefined
): string[] => {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || "";
    const message = error.message ?? "is invalid";
    return `${schemaName}${path}: ${message}`.trim();
  });
};
