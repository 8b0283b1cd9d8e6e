/** Thrown when the chatbot is used before {@link ChatBot.initialize} was called. */
export class ChatBotStateError extends Error {
  constructor(operation: string) {
    super(`ChatBot.${operation}() called before initialize()`);
    this.name = "ChatBotStateError";
  }
}
