import type { SerializedError } from "./types";

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

export function toJson(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (v instanceof Error) return serializeError(v);
      if (typeof v === "bigint") return v.toString();
      return v;
    });
  } catch (error) {
    return JSON.stringify({ unserializable: serializeError(error).message });
  }
}
