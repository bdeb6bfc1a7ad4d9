import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { StringSession } from "telegram/sessions/index.js";

// Session string is stored as a single line; an absent file means "log in again".
export function loadSession(file: string): StringSession {
  if (!existsSync(file)) return new StringSession("");
  return new StringSession(readFileSync(file, "utf-8").trim());
}

export function saveSession(file: string, session: StringSession): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, session.save() + "\n", { encoding: "utf-8", mode: 0o600 });
}

/** Ask a single question on the controlling terminal. */
export async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim();
  } finally {
    rl.close();
  }
}
