export const PLUGIN_PREFIX = "devflow-plugin-";

export type PluginRequest = {
  command: string;
  payload: unknown;
};

export type PluginResponse = {
  ok: boolean;
  message: string;
  data: unknown;
};

export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PluginError";
  }
}

export const formatUnknownError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const isPluginResponse = (value: unknown): value is PluginResponse => {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  return (
    typeof Reflect.get(value, "ok") === "boolean" &&
    typeof Reflect.get(value, "message") === "string" &&
    Object.prototype.hasOwnProperty.call(value, "data")
  );
};

export const parsePluginResponse = (raw: string): PluginResponse => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PluginError(`plugin produced invalid JSON: ${formatUnknownError(err)}`);
  }
  if (!isPluginResponse(parsed)) {
    throw new PluginError("plugin produced invalid JSON: expected { ok, message, data }");
  }
  return { ok: parsed.ok, message: parsed.message, data: parsed.data };
};

/**
 * No argument gives `{}`. Text that is not JSON is passed through as `{ raw }`.
 */
export const parsePluginPayload = (raw?: string): unknown => {
  if (raw === undefined) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    return { raw };
  }
};

export const formatPluginResponse = (response: PluginResponse): string => JSON.stringify(response, null, 2);
