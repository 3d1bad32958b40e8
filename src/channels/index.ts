// Chat front end
export { createChatFrontEnd, detectIntent, renderOutcome } from './chat-front-end.js';
export type { ChatFrontEnd, ChatIntent, ChatReply, RecordContext } from './chat-front-end.js';
