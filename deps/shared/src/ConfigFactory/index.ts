import { type StaticDecode, type TSchema, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

type Env = Record<string, string | undefined>;

/**
 * 以 typebox schema 解碼環境變數，回傳可重複呼叫的設定工廠。
 * 解碼失敗會直接拋出，讓設定錯誤在啟動時就被發現。
 */
export function buildConfigFactoryEnv<T extends TSchema>(schema: T) {
  return (env: Env = process.env): StaticDecode<T> => {
    const withDefaults = Value.Default(schema, Value.Clone({ ...env }));
    return Value.Decode(schema, withDefaults);
  };
}

export function envBoolean() {
  return t
    .Transform(
      t.Union([
        t.Literal("true"),
        t.Literal("false"),
        t.Literal("1"),
        t.Literal("0"),
      ])
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

export function envNumber(options?: { default?: number }) {
  const pattern = "^-?\\d+(\\.\\d+)?$";
  const schema = t.String(
    options?.default === undefined
      ? { pattern }
      : { pattern, default: String(options.default) }
  );
  return t
    .Transform(schema)
    .Decode((v) => Number(v))
    .Encode((v) => String(v));
}
