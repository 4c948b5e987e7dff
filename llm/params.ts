import { z } from "zod";
import type { ParamValue } from "./Interfaces.js";

export const TIMEOUT_PARAM = "timeout";

interface ParamRule {
  // Shown in warnings when a value is rejected.
  expects: string;
  schema: z.ZodType<ParamValue>;
}

function numberIn(min: number, max: number): ParamRule {
  return {
    expects: `a number in [${min}, ${max}]`,
    schema: z.number().finite().min(min).max(max),
  };
}

export const ALLOWED_PARAMS = {
  max_tokens: numberIn(1, 32768),
  temperature: numberIn(0, 2),
  top_p: numberIn(0, 1),
  top_k: numberIn(1, 100),
  frequency_penalty: numberIn(-2, 2),
  presence_penalty: numberIn(-2, 2),
  stream: { expects: "a boolean", schema: z.boolean() },
  stop: { expects: "a string or a list of strings", schema: z.union([z.string(), z.array(z.string())]) },
  // Past 2^53 the parsed number is no longer the integer that was typed.
  seed: { expects: "a safe integer", schema: z.number().int().safe() },
} satisfies Record<string, ParamRule>;

export type AllowedParam = keyof typeof ALLOWED_PARAMS;

function isAllowedParam(name: string): name is AllowedParam {
  return Object.prototype.hasOwnProperty.call(ALLOWED_PARAMS, name);
}

function describe(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

export interface FilteredParams {
  params: Record<string, ParamValue>;
  timeout?: number;
  warnings: string[];
}

/**
 * Keeps the allow-listed parameters whose values pass their rule. Everything
 * else is dropped with a warning; `timeout` is split off for the transport.
 */
export function filterParams(raw: Record<string, unknown> = {}): FilteredParams {
  const params: Record<string, ParamValue> = {};
  const warnings: string[] = [];
  let timeout: number | undefined;

  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (name === TIMEOUT_PARAM) {
      if (typeof value === "number" && Number.isFinite(value) && value > 0) {
        timeout = value;
      } else {
        warnings.push(`Parameter timeout=${describe(value)} must be a positive number of seconds, using the default`);
      }
      continue;
    }
    if (!isAllowedParam(name)) {
      warnings.push(`Ignoring unsupported parameter: ${name}`);
      continue;
    }
    const rule: ParamRule = ALLOWED_PARAMS[name];
    const parsed = rule.schema.safeParse(value);
    if (!parsed.success) {
      warnings.push(`Parameter ${name}=${describe(value)} must be ${rule.expects}, ignoring`);
      continue;
    }
    params[name] = parsed.data;
  }

  return { params, timeout, warnings };
}
