export type LogLevel = "quiet" | "info" | "verbose" | "debug";

export type OutputMode = "plain" | "json";

export type EnvelopeError = { message: string; code: string };

export type EnvelopeMeta = {
  tool: string;
  version: string;
  timestamp: string;
  request_id?: string;
};

/** Every `--json` result, success or failure, has this shape. */
export type JsonEnvelope<T> = {
  schema: string;
  meta: EnvelopeMeta;
  summary: string;
  status: "success" | "error";
  data: T;
  errors: EnvelopeError[];
};

export type CliGlobals = {
  json: boolean;
  plain: boolean;
  output?: string;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
  requestId?: string;
};
