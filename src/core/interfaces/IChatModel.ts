/**
 * Chat Model Interface
 *
 * Black-box interface for chat-style LLM calls.
 * Provider clients live outside this package and adapt to this shape.
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Result of one chat call
 */
export interface ChatResponse {
  /** Generated text */
  content: string;
}

export interface ChatModel {
  invoke(messages: ChatMessage[]): Promise<ChatResponse>;
}
