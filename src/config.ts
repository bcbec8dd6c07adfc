import {
  integer,
  maxValue,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  type InferOutput,
} from "valibot";
import { BridgeError, ErrorCode } from "./errors";
import { domainSchema } from "./schema";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const attemptsSchema = pipe(
  number(),
  integer("max attempts must be an integer"),
  minValue(1, "max attempts must be at least 1"),
  maxValue(1_000_000, "max attempts is too large"),
);

const digits = regex(/^\d+$/, "expected a decimal integer");

// env values are strings; numeric ones go through Number before validation
const envSchema = object({
  BRIDGE_LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  BRIDGE_LOG_PRETTY: optional(picklist(["0", "1"]), "0"),
  BRIDGE_HUB_DOMAIN: optional(pipe(string(), digits, transform(Number), domainSchema), "31337"),
  BRIDGE_UNMAPPED_TOKEN_POLICY: optional(picklist(["reject", "absorb"]), "reject"),
  BRIDGE_RELAYER_MAX_ATTEMPTS: optional(pipe(string(), digits, transform(Number), attemptsSchema), "20"),
});

export type BridgeEnv = InferOutput<typeof envSchema>;

export interface BridgeConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  logPretty: boolean;
  hubDomain: number;
  unmappedTokenPolicy: "reject" | "absorb";
  relayerMaxAttempts: number;
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): BridgeConfig => {
  const parsed = safeParse(envSchema, env);
  if (!parsed.success) {
    const problems = parsed.issues.map((issue) => {
      const key = issue.path?.map((p) => String(p.key)).join(".") ?? "env";
      return `${key}: ${issue.message}`;
    });
    throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `invalid configuration: ${problems.join("; ")}`, {
      problems,
    });
  }
  const e = parsed.output;
  return {
    logLevel: e.BRIDGE_LOG_LEVEL,
    logPretty: e.BRIDGE_LOG_PRETTY === "1",
    hubDomain: e.BRIDGE_HUB_DOMAIN,
    unmappedTokenPolicy: e.BRIDGE_UNMAPPED_TOKEN_POLICY,
    relayerMaxAttempts: e.BRIDGE_RELAYER_MAX_ATTEMPTS,
  };
};
