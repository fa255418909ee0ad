export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  id: string;
  role: ChatRole;
  content: string;
  timestamp: Date;
  isStreaming: boolean;
  reasoning: string;
  answer: string;
};

export type ChatState = {
  messages: ChatMessage[];
  isLoading: boolean;
  error: string | null;
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};

export type DebugListener = (event: DebugEvent) => void;
