import { z } from 'zod';
import type { ChatMessage } from './types.js';

const chatMessageSchema = z.object({
  sender: z.string().min(1).default('scammer'),
  text: z.string(),
  timestamp: z.number().int().nonnegative().optional(),
});

// Older clients send the latest message as a bare string.
const latestMessageSchema = z.union([
  z.string().min(1).transform((text) => ({ sender: 'scammer', text })),
  chatMessageSchema,
]);

const withTimestamp = (message: { sender: string; text: string; timestamp?: number }): ChatMessage => ({
  sender: message.sender,
  text: message.text,
  timestamp: message.timestamp ?? Date.now(),
});

export const incomingEventSchema = z.object({
  sessionId: z.string().min(1, 'Missing sessionId'),
  message: latestMessageSchema.transform(withTimestamp),
  conversationHistory: z.array(chatMessageSchema.transform(withTimestamp)).default([]),
  metadata: z
    .object({
      channel: z.string().default('SMS'),
      language: z.string().default('English'),
      locale: z.string().default('IN'),
    })
    .default({}),
});

export type IncomingEventInput = z.input<typeof incomingEventSchema>;

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
