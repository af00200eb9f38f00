/** How session variables are written in fragments. */
export type AddressingMode = 'sigil' | 'declared';

export const PROMPT_START = '>>> ';
export const PROMPT_CONTINUATION = '... ';

export const RESULT_SLOT = '_';
export const SESSION_SLOT = 'interpreter';
