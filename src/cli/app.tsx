import React, { useEffect, useState } from "react";
import { Box, Newline, render, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import type { ChatMessage, ChatState } from "../chat-types.js";
import type { ChatSessionStore } from "../client/index.js";
import { summarizeError } from "../errors.js";

const GLYPH_USER = "> ";
const GLYPH_ASSISTANT = "⟣ ";
const GLYPH_SYSTEM = "⌁ ";

type ChatAppProps = {
  store: ChatSessionStore;
  serverUrl: string;
};

function ChatApp({ store, serverUrl }: ChatAppProps) {
  const { exit } = useApp();
  const [state, setState] = useState<ChatState>(() => store.getState());
  const [input, setInput] = useState("");
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => store.subscribe(setState), [store]);

  useInput((character, key) => {
    if (key.ctrl && character === "c") {
      store.stop();
      exit();
      return;
    }
    if (key.escape && state.isLoading) {
      store.stop();
    }
  });

  const submit = (value: string) => {
    const prompt = value.trim();
    setInput("");
    setNotice(null);
    if (!prompt) {
      return;
    }
    if (prompt === "/exit" || prompt === "/quit") {
      store.stop();
      exit();
      return;
    }
    if (prompt === "/clear") {
      store.clear();
      return;
    }
    if (state.isLoading) {
      setNotice("a response is still streaming; press esc to stop it first");
      return;
    }

    store.send(prompt).catch((error: unknown) => {
      setNotice(`send failed: ${summarizeError(error)}`);
    });
  };

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="cyanBright">thinkstream</Text>
      <Text color="gray">server: {serverUrl} | /clear resets | /exit quits</Text>
      <Newline />
      <Box flexDirection="column">
        {state.messages.map((message) => (
          <MemoizedMessageRow key={message.id} message={message} />
        ))}
      </Box>
      {state.error && (
        <Text color="red">
          {GLYPH_SYSTEM}error: {state.error}
        </Text>
      )}
      {notice && <Text color="yellow">{GLYPH_SYSTEM}{notice}</Text>}
      {state.isLoading && <Text color="yellow">{GLYPH_SYSTEM}streaming... (esc to stop)</Text>}
      <Box marginTop={1}>
        <Text color="magentaBright">{GLYPH_USER}</Text>
        <TextInput value={input} onChange={setInput} onSubmit={submit} />
      </Box>
    </Box>
  );
}

function MessageRow({ message }: { message: ChatMessage }) {
  if (message.role === "user") {
    return (
      <Box flexDirection="column" marginBottom={1}>
        <Text color="blueBright">
          {GLYPH_USER}
          {message.content}
        </Text>
      </Box>
    );
  }

  const answering = message.isStreaming && message.answer.length > 0;
  return (
    <Box flexDirection="column" marginBottom={1}>
      {message.reasoning && (
        <Box flexDirection="column">
          <Text color="gray">{message.isStreaming && !answering ? "thinking..." : "thought process"}</Text>
          <Text color="gray" italic>
            {message.reasoning}
          </Text>
        </Box>
      )}
      {(message.answer || !message.reasoning) && (
        <Text>
          {GLYPH_ASSISTANT}
          {message.answer || (message.isStreaming ? "" : message.content)}
        </Text>
      )}
    </Box>
  );
}

const MemoizedMessageRow = React.memo(MessageRow);

export async function startChatApp(props: ChatAppProps): Promise<void> {
  const instance = render(<ChatApp {...props} />);
  await instance.waitUntilExit();
}
