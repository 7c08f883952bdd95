import { CENSOR_SYMBOLS, escapeRegex } from "./textNormalization";

// Word runs keep censor symbols so "f***" stays one token; each emoji (with modifiers and ZWJ joins) is its own token.
const WORD_CHUNK = String.raw`[\p{L}\p{M}\p{N}${CENSOR_SYMBOLS.map(escapeRegex).join("")}]+`;
const EMOJI_CHUNK = String.raw`\p{Extended_Pictographic}(?:[\u{1f3fb}-\u{1f3ff}\ufe0f]|\u200d\p{Extended_Pictographic})*`;
const TOKEN_RE = new RegExp(`${WORD_CHUNK}|${EMOJI_CHUNK}`, "gu");

export const tokenize = (text: string): string[] => text.match(TOKEN_RE) ?? [];

export const isEmojiToken = (token: string): boolean => /^\p{Extended_Pictographic}/u.test(token);
