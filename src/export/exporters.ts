import fs from "node:fs/promises";
import path from "node:path";
import { format, formatISO } from "date-fns";
import type { ChatMessage } from "../contracts.js";

export type MessageRecord = {
  timestamp: string;
  sender: string;
  text: string;
  attachments: string[];
  initiated_by_member: boolean;
};

export const TRANSCRIPT_FOOTER = "--- End of conversation ---";

export function toMessageRecord(message: ChatMessage): MessageRecord {
  return {
    timestamp: formatISO(message.timestamp),
    sender: message.sender,
    text: message.text,
    attachments: [...(message.attachments ?? [])],
    initiated_by_member: message.initiatedByMember,
  };
}

export function renderChatLine(message: ChatMessage): string {
  return `[${format(message.timestamp, "M/d/yy, h:mm a")}] ${message.sender}: ${message.text}`;
}

export function renderJsonl(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${JSON.stringify(toMessageRecord(message))}\n`).join("");
}

export function renderTranscript(messages: readonly ChatMessage[]): string {
  const lines = messages.map((message) => `${renderChatLine(message)}\n`).join("");
  return `${lines}\n${TRANSCRIPT_FOOTER}\n`;
}

async function writeText(file: string, content: string): Promise<string> {
  const resolved = path.resolve(file);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, content, "utf8");
  return resolved;
}

export async function exportJsonl(messages: readonly ChatMessage[], file: string): Promise<string> {
  return writeText(file, renderJsonl(messages));
}

export async function exportTranscript(messages: readonly ChatMessage[], file: string): Promise<string> {
  return writeText(file, renderTranscript(messages));
}

export async function writeRunSummary(summary: unknown, file: string): Promise<string> {
  return writeText(file, `${JSON.stringify(summary, null, 2)}\n`);
}
