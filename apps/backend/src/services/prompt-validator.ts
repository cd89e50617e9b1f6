import { PromptValidationError } from "../utils/errors.js";

export const MAX_PROMPT_LENGTH = 500;

// Length is counted in code points, before whitespace is collapsed.
const characterCount = (value: string) => [...value].length;

// \s plus NEL and the information separators U+001C..U+001F.
const WHITESPACE_RUN = /[\s\u0085\u001c-\u001f]+/gu;
const EDGE_WHITESPACE = /^[\s\u0085\u001c-\u001f]+|[\s\u0085\u001c-\u001f]+$/gu;

export const normalizePrompt = (value: string) => value.replace(EDGE_WHITESPACE, "").replace(WHITESPACE_RUN, " ");

export const validatePrompt = (raw: string) => {
  if (normalizePrompt(raw).length === 0) {
    throw new PromptValidationError("EMPTY_PROMPT", "Prompt cannot be empty.");
  }

  if (characterCount(raw) > MAX_PROMPT_LENGTH) {
    throw new PromptValidationError("PROMPT_TOO_LONG", `Prompt is too long (max ${MAX_PROMPT_LENGTH} characters).`);
  }

  return normalizePrompt(raw);
};
