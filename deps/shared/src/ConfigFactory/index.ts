import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

type Env = Record<string, string | undefined>;

/**
 * 依 typebox schema 由環境變數建立設定。
 * 只讀取 schema 宣告的鍵，字串會依型別轉換，並套用 default。
 * 結果會快取，同一個 factory 只解析一次。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Env = process.env
): () => Static<T> {
  let cached: Static<T> | undefined;
  return () => {
    if (cached !== undefined) return cached;
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const value = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      throw new Error(
        `環境變數設定錯誤: ${first ? `${first.path} ${first.message}` : "未知"}`
      );
    }
    cached = value;
    return value;
  };
}

export function envBoolean() {
  return t.Boolean();
}

export function envInteger(options?: { minimum?: number; default?: number }) {
  return t.Integer(options);
}
