import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/**
 * Validate `data` against a JSON Schema (draft 2020-12, with formats). Errors
 * are one message per violation, prefixed with `dataVar` ("config/DB_PORT must
 * match ..."). Each call compiles into a fresh instance so schemas sharing an
 * `$id` never collide.
 */
export function checkSchema<T>(schema: unknown, data: unknown, dataVar = "data"): SchemaCheck<T> {
  const ajv = createAjv();
  const validate = ajv.compile<T>(schema);
  if (validate(data)) return { ok: true, value: data };
  const text = ajv.errorsText(validate.errors, { separator: "\n", dataVar });
  return { ok: false, errors: text.split("\n") };
}
