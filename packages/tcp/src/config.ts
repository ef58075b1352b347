// Relay configuration.
//
// Priority: explicit constructor options > environment > defaults. The entry
// points read the environment through loadServerConfig / loadClientConfig.

import { z } from "zod";
import { MAX_FRAME_LENGTH } from "@fanout/wire";
import { DEFAULT_MAX_FRAME_LENGTH } from "./framing.ts";

/** Port the relay listens on unless told otherwise. */
export const DEFAULT_PORT = 54000;

/** Configuration for the relay server. */
export interface ServerConfig {
  /** Interface to bind. */
  host: string;
  /** TCP port; 0 picks a free port. */
  port: number;
  /** Largest frame body accepted from a client. */
  maxFrameLength: number;
  /** Close sessions idle for this long; 0 disables the timeout. */
  idleTimeoutMs: number;
}

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return {
    host: "0.0.0.0",
    port: DEFAULT_PORT,
    maxFrameLength: DEFAULT_MAX_FRAME_LENGTH,
    idleTimeoutMs: 0,
  };
}

/** Where a client connects to. */
export interface ClientConfig {
  host: string;
  port: number;
}

/** One or more environment variables failed validation. */
export class ConfigError extends Error {
  constructor(readonly variables: string[], message: string) {
    super(message);
    this.name = "ConfigError";
  }

  static fromZod(error: z.ZodError): ConfigError {
    const variables = error.issues.map((issue) => issue.path.join("."));
    const details = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return new ConfigError(variables, `invalid configuration: ${details.join("; ")}`);
  }
}

// Empty strings are rejected before coercion; Number("") would be 0.
const integer = (min: number, max: number) =>
  z.string().min(1).pipe(z.coerce.number().int().min(min).max(max));

const port = integer(0, 65535);

const serverEnvSchema = z.object({
  FANOUT_HOST: z.string().min(1).optional(),
  FANOUT_PORT: port.optional(),
  FANOUT_MAX_FRAME_LENGTH: integer(6, MAX_FRAME_LENGTH).optional(),
  FANOUT_IDLE_TIMEOUT_MS: integer(0, Number.MAX_SAFE_INTEGER).optional(),
});

const serverAddress = z
  .string()
  .regex(/^.+:\d+$/, "expected host:port")
  .transform((value) => {
    const lastColon = value.lastIndexOf(":");
    return { host: value.slice(0, lastColon), port: value.slice(lastColon + 1) };
  })
  .pipe(z.object({ host: z.string().min(1), port }));

const clientEnvSchema = z.object({
  FANOUT_SERVER: serverAddress.optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Build the server configuration from environment variables.
 *
 * - FANOUT_HOST (default 0.0.0.0)
 * - FANOUT_PORT (default 54000)
 * - FANOUT_MAX_FRAME_LENGTH (default 16 MiB)
 * - FANOUT_IDLE_TIMEOUT_MS (default 0, disabled)
 *
 * @throws ConfigError
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error);
  }
  const defaults = defaultServerConfig();
  return {
    host: parsed.data.FANOUT_HOST ?? defaults.host,
    port: parsed.data.FANOUT_PORT ?? defaults.port,
    maxFrameLength: parsed.data.FANOUT_MAX_FRAME_LENGTH ?? defaults.maxFrameLength,
    idleTimeoutMs: parsed.data.FANOUT_IDLE_TIMEOUT_MS ?? defaults.idleTimeoutMs,
  };
}

/**
 * Build the client configuration from `FANOUT_SERVER` (`host:port`), falling
 * back to `127.0.0.1:54000`. An explicit address takes priority over the
 * environment.
 *
 * @throws ConfigError
 */
export function loadClientConfig(env: Env = process.env, address?: string): ClientConfig {
  const parsed = clientEnvSchema.safeParse(
    address === undefined ? env : { ...env, FANOUT_SERVER: address },
  );
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error);
  }
  return parsed.data.FANOUT_SERVER ?? { host: "127.0.0.1", port: DEFAULT_PORT };
}
