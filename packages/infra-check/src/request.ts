import type { Readable } from "stream";
import { TextDecoder } from "util";
import type { InfraCheckRequest } from "./check";
import { MalformedRequestError, formatUnknownError } from "./errors";

export const readAll = async (input: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(Buffer.concat(chunks));
  } catch {
    throw new MalformedRequestError("request is not valid UTF-8");
  }
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

/**
 * Blank input is the empty request. Anything else must be a JSON object.
 */
export const parseRequest = (raw: string): InfraCheckRequest => {
  const trimmed = raw.trim();
  if (!trimmed) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new MalformedRequestError(`request is not valid JSON: ${formatUnknownError(err)}`);
  }

  if (!isPlainObject(parsed)) {
    const kind = parsed === null ? "null" : Array.isArray(parsed) ? "array" : typeof parsed;
    throw new MalformedRequestError(`request must be a JSON object, got ${kind}`);
  }
  return parsed;
};
