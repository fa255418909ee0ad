export type ParsedArgs = {
  command: string;
  positionals: string[];
  flags: Map<string, string>;
};

export function parseArgs(argv: string[]): ParsedArgs {
  const [command = "chat", ...rest] = argv;
  const positionals: string[] = [];
  const flags = new Map<string, string>();
  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index] ?? "";
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    const body = token.slice(2);
    const equals = body.indexOf("=");
    if (equals >= 0) {
      flags.set(body.slice(0, equals), body.slice(equals + 1));
      continue;
    }
    const name = body;
    const next = rest[index + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(name, next);
      index += 1;
    } else {
      flags.set(name, "true");
    }
  }
  return { command, positionals, flags };
}
