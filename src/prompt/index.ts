/**
 * Prompt Module
 */

export {
  ReadlinePrompt,
  isConfirmed,
  type ConfirmationPrompt,
  type ReadlinePromptOptions,
} from './confirmation';
