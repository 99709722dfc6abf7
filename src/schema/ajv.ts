import fs from "node:fs";
import path from "node:path";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { packageRoot } from "../config/paths.js";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

export type AjvOptions = {
  /** Coerce scalar strings (env overrides) into the schema's number/boolean types. */
  coerceTypes?: boolean;
};

export function createAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, coerceTypes: opts.coerceTypes ?? false });
  add(ajv);

  return ajv;
}

export function schemaDir(): string {
  return path.join(packageRoot(), "schemas");
}

/** Read a schema shipped under schemas/, e.g. readSchema("state"). */
export function readSchema(name: string, dir: string = schemaDir()): unknown {
  const filePath = path.join(dir, `${name}.schema.json`);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Schema not found: ${filePath}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return parsed;
}

export type SchemaCheck<T> = (data: unknown) => { valid: true; value: T } | { valid: false; errors: string };

/** Compile a named schema into a checker that narrows on success. */
export function compileSchema<T>(name: string, opts: AjvOptions & { dir?: string } = {}): SchemaCheck<T> {
  const ajv = createAjv(opts);
  const validate = ajv.compile<T>(readSchema(name, opts.dir));
  return (data) => {
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  };
}
