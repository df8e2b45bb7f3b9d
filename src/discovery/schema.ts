import AjvPkg, { type ErrorObject, type ValidateFunction } from "ajv";

// ajv is CommonJS; under NodeNext its class is the `default` member.
const Ajv = AjvPkg.default;

export const DURATION_PATTERN =
  "^(?:\\d+y)?(?:\\d+w)?(?:\\d+d)?(?:\\d+h)?(?:\\d+m)?(?:\\d+s)?(?:\\d+ms)?$";

export interface ScrapeTargetInput {
  selector: Record<string, string>;
  port: string;
  path?: string;
  interval?: string;
  timeout?: string;
  scheme?: "http" | "https";
}

export const ScrapeTargetDescriptorSchema = {
  $id: "ScrapeTargetDescriptor",
  type: "object",
  additionalProperties: false,
  required: ["selector", "port"],
  properties: {
    selector: {
      type: "object",
      propertyNames: { type: "string", pattern: "^[a-zA-Z0-9]([a-zA-Z0-9_./-]*[a-zA-Z0-9])?$" },
      additionalProperties: { type: "string", maxLength: 63 }
    },
    port: { type: "string", minLength: 1, maxLength: 15 },
    path: { type: "string", pattern: "^/", default: "/metrics" },
    interval: { type: "string", minLength: 1, pattern: DURATION_PATTERN, default: "15s" },
    timeout: { type: "string", minLength: 1, pattern: DURATION_PATTERN },
    scheme: { type: "string", enum: ["http", "https"], default: "http" }
  }
} as const;

export type ValidateOk<T> = { ok: true; value: T };
export type ValidateErr = { ok: false; errors: ErrorObject[] };

function buildAjv() {
  const ajv = new Ajv({
    allErrors: true,
    strict: true,
    useDefaults: true
  });
  return ajv;
}

const ajvSingleton = buildAjv();

const validateInputFn: ValidateFunction<ScrapeTargetInput> = ajvSingleton.compile<ScrapeTargetInput>(
  ScrapeTargetDescriptorSchema
);

/** Validates in place; Ajv fills missing optional fields with their defaults. */
export function validateScrapeTargetInput(input: unknown): ValidateOk<ScrapeTargetInput> | ValidateErr {
  if (validateInputFn(input)) return { ok: true, value: input };
  return { ok: false, errors: validateInputFn.errors ?? [] };
}
