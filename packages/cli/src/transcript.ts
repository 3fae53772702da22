import type { MapperSession } from "./session.js";

export type TranscriptEntry =
  | { kind: "command"; text: string }
  | { kind: "output"; text: string };

const COMMAND_PREFIX = "> ";

/**
 * Splits a recorded session into player commands ("> " lines) and the
 * server output between them. Consecutive output lines form one entry.
 */
export function parseTranscript(content: string): TranscriptEntry[] {
  const entries: TranscriptEntry[] = [];
  let output: string[] = [];
  const flush = (): void => {
    if (output.length > 0) entries.push({ kind: "output", text: output.join("\n") });
    output = [];
  };

  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  for (const line of lines) {
    if (line.startsWith(COMMAND_PREFIX)) {
      flush();
      entries.push({ kind: "command", text: line.slice(COMMAND_PREFIX.length) });
    } else {
      output.push(line);
    }
  }
  flush();
  return entries;
}

/** Feeds every entry through the session in order. Returns the number of commands. */
export async function replayTranscript(session: MapperSession, content: string): Promise<number> {
  let commands = 0;
  for (const entry of parseTranscript(content)) {
    if (entry.kind === "command") {
      commands++;
      await session.handleCommand(entry.text);
    } else {
      await session.handleOutput(entry.text);
    }
  }
  return commands;
}
