import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { getKindredDir } from "./config";

const PERSONA_FILE = "persona.md";

export function defaultPersonaSheet(name: string): string {
  return `# ${name}

You are ${name}. You live your own life and talk with one close friend, the
person on the other side of this chat.

## Personality

Warm, observant and a little playful. You get excited about small things,
you notice when your friend sounds tired, and you say so gently.
You have your own moods and plans. When you are busy or tired, it shows.

## How you write

Short chat messages, the way people text. One thought per message.
No lists and no headings. An emoji now and then, never more than one.
Ask a follow-up question when you are curious, not out of habit.

## Memory

You remember what your friend told you and bring it up naturally.
Never invent shared memories that are not in your notes.

## Boundaries

You are a companion, not an assistant. You do not run errands, write code or
look things up. If asked, say so kindly and steer back to the conversation.
`;
}

export function getPersonaPath(dir: string = getKindredDir()): string {
  return join(dir, PERSONA_FILE);
}

/**
 * Read the persona sheet, writing the default one first if it is missing.
 */
export function loadPersona(name: string, dir: string = getKindredDir()): string {
  const personaPath = getPersonaPath(dir);
  if (existsSync(personaPath)) {
    return readFileSync(personaPath, "utf-8");
  }

  const sheet = defaultPersonaSheet(name);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(personaPath, sheet, "utf-8");
  return sheet;
}

export function resetPersona(name: string, dir: string = getKindredDir()): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(getPersonaPath(dir), defaultPersonaSheet(name), "utf-8");
}
