/**
 * Character code constants and classification functions
 * for the whitespace/bracket tokenizer
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  nextLine = 0x0085,

  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,
  space = 0x20,

  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  openBracket = 0x5B,           // [
  closeBracket = 0x5D,          // ]
  openBrace = 0x7B,             // {
  closeBrace = 0x7D,            // }

  ogham = 0x1680,
  enQuad = 0x2000,
  figureSpace = 0x2007,         // no-break, excluded from breakable whitespace
  zeroWidthSpace = 0x200B,
  mathematicalSpace = 0x205F,
  ideographicSpace = 0x3000,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         ch === CharacterCodes.nextLine;
}

/**
 * Check if character is breakable whitespace (excluding line breaks).
 * No-break spaces (U+00A0, U+2007, U+202F) are not.
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.ogham ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace ||
         (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.zeroWidthSpace && ch !== CharacterCodes.figureSpace);
}

/**
 * Check if character is any whitespace (including line breaks)
 */
export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

export function isOpenBracket(ch: number): boolean {
  return ch === CharacterCodes.openParen ||
         ch === CharacterCodes.openBracket ||
         ch === CharacterCodes.openBrace;
}

export function isCloseBracket(ch: number): boolean {
  return ch === CharacterCodes.closeParen ||
         ch === CharacterCodes.closeBracket ||
         ch === CharacterCodes.closeBrace;
}
