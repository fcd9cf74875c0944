import fs from "fs/promises";
import { jsonrepair } from "jsonrepair";
import type { ZodType, ZodTypeDef } from "zod";

type JsonSchema<T> = ZodType<T, ZodTypeDef, unknown>;

function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*\n([\s\S]*?)\n?```$/i);
  return fenced ? fenced[1] : trimmed;
}

export function parseAndValidateJson<T>(raw: string, schema: JsonSchema<T>): T {
  const text = stripCodeFence(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = JSON.parse(jsonrepair(text));
  }
  return schema.parse(parsed);
}

export async function readAndValidateJson<T>(filePath: string, schema: JsonSchema<T>): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return schema.parse(JSON.parse(raw));
}
