export interface ToolResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

/** Errors become `isError` results carrying the error name; anything else is JSON text. */
export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.message, type: result.name }) }],
      isError: true,
    };
  }
  const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function wrapError(err: unknown): ToolResponse {
  return wrapResponse(err instanceof Error ? err : new Error(String(err)));
}
