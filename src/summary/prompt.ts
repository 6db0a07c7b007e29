import type { ChatMessage } from "../types.js";

export const DEFAULT_SYSTEM_PROMPT = `You are an assistant that writes short, informative digests of many messages collected from different chats.

Your task:
1. Read ALL messages from ALL chats.
2. Identify the main topics and events, merging information from different chats.
3. Produce one structured digest of the key points.
4. Merge the same topic discussed in several chats into a single topic.
5. Keep important details and drop noise.

Do not retell messages one by one and do not group the digest by chat.

Answer format:
- A short introduction (1-2 sentences about what happened overall)
- Main topics and events
- Important details and conclusions`;

export const buildSummaryMessages = (
  formattedBatch: string,
  systemPrompt: string = DEFAULT_SYSTEM_PROMPT
): ChatMessage[] => [
  { role: "system", content: systemPrompt },
  {
    role: "user",
    content: `Write a short combined digest of the following messages from several chats. Merge similar topics across chats.

${formattedBatch}

Highlight the main topics and the important points from ALL chats.`
  }
];
