export type ParsedEnvelope =
  | { kind: "json"; value: unknown; text: string }
  | { kind: "service_error"; code: string; message?: string; text: string }
  | { kind: "unparseable"; text: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseEnvelope(body: Buffer): ParsedEnvelope {
  const text = body.toString("utf-8");
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { kind: "unparseable", text };
  }

  if (isRecord(value) && isRecord(value.error)) {
    const { code, message } = value.error;
    return {
      kind: "service_error",
      code: typeof code === "number" || typeof code === "string" ? String(code) : "Unidentified",
      message: typeof message === "string" ? message : undefined,
      text,
    };
  }

  return { kind: "json", value, text };
}
