/**
 * Generation Module
 */

export {
  NO_INFORMATION_REPLY,
  LINKS_HEADING,
  CONTEXT_DELIMITER,
  DEFAULT_COMPANY_NAME,
  buildSystemPrompt,
  buildUserPrompt,
  buildMessages,
} from './prompt.js';
export { GenerationClient, type GenerationClientOptions } from './generation-client.js';
