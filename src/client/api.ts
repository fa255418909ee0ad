export const DEFAULT_API_BASE_URL = "http://localhost:8000";
export const CHAT_STREAM_PATH = "/chat/stream";

export type ChatStreamRequest = {
  baseUrl?: string;
  query: string;
  systemPrompt?: string;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
};

/**
 * Opens one streaming turn and returns the raw response body. Non-2xx
 * responses throw with the server's `detail` when it sent one.
 */
export async function openChatStream(request: ChatStreamRequest): Promise<ReadableStream<Uint8Array>> {
  const fetchImpl = request.fetchImpl ?? fetch;
  const baseUrl = (request.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const body: Record<string, string> = { query: request.query };
  const systemPrompt = request.systemPrompt?.trim();
  if (systemPrompt) {
    body.system_prompt = systemPrompt;
  }

  const response = await fetchImpl(`${baseUrl}${CHAT_STREAM_PATH}`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "text/event-stream",
    },
    body: JSON.stringify(body),
    signal: request.signal,
  });

  if (!response.ok) {
    const payload: unknown = await response.json().catch(() => null);
    throw new Error(readErrorDetail(payload) ?? `API request failed with status ${response.status}`);
  }

  if (!response.body) {
    throw new Error("No response body");
  }

  return response.body;
}

function readErrorDetail(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("detail" in payload)) {
    return null;
  }
  const detail = payload.detail;
  return typeof detail === "string" && detail.trim() ? detail : null;
}
