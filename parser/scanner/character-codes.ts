/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  tab = 0x09,

  // ASCII printable characters
  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  singleQuote = 0x27,           // '
  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  comma = 0x2C,                 // ,
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  colon = 0x3A,                 // :
  lessThan = 0x3C,              // <
  greaterThan = 0x3E,           // >

  A = 0x41, F = 0x46, X = 0x58, Z = 0x5A,

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  underscore = 0x5F,            // _
  backtick = 0x60,              // `

  a = 0x61, f = 0x66, x = 0x78, z = 0x7A,

  openBrace = 0x7B,             // {
  bar = 0x7C,                   // |
  closeBrace = 0x7D,            // }
  tilde = 0x7E,                 // ~

  // Substitution glyphs written into the display text
  bullet = 0x2022,              // •
  boxDrawingHorizontal = 0x2500,// ─
  leftHalfBlock = 0x258C,       // ▌
  blackSquare = 0x25A0,         // ■
  whiteSquare = 0x25A1,         // □

  digit0 = CharacterCodes._0,
  digit9 = CharacterCodes._9,
}

/**
 * Check if character is a line break. Only LF and CR end a line in the
 * markup dialect; Unicode separators are ordinary text.
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * Check if character is an ASCII letter
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes.digit0 && ch <= CharacterCodes.digit9;
}

/**
 * Check if character is a hexadecimal digit
 */
export function isHexDigit(ch: number): boolean {
  return isDigit(ch) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.F) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.f);
}

/**
 * Emphasis delimiters: `*` and `_`
 */
export function isEmphasisMarker(ch: number): boolean {
  return ch === CharacterCodes.asterisk || ch === CharacterCodes.underscore;
}

/**
 * Horizontal rule markers: `-`, `*` and `_`
 */
export function isRuleMarker(ch: number): boolean {
  return ch === CharacterCodes.minus ||
         ch === CharacterCodes.asterisk ||
         ch === CharacterCodes.underscore;
}

/**
 * Unordered list markers: `-`, `+` and `*`
 */
export function isBulletMarker(ch: number): boolean {
  return ch === CharacterCodes.minus ||
         ch === CharacterCodes.plus ||
         ch === CharacterCodes.asterisk;
}

/**
 * Check if a backslash in front of this character escapes it
 */
export function isEscapablePunctuation(ch: number): boolean {
  return ch === CharacterCodes.backslash ||
         ch === CharacterCodes.backtick ||
         ch === CharacterCodes.asterisk ||
         ch === CharacterCodes.underscore ||
         ch === CharacterCodes.openBrace ||
         ch === CharacterCodes.closeBrace ||
         ch === CharacterCodes.openBracket ||
         ch === CharacterCodes.closeBracket ||
         ch === CharacterCodes.openParen ||
         ch === CharacterCodes.closeParen ||
         ch === CharacterCodes.hash ||
         ch === CharacterCodes.plus ||
         ch === CharacterCodes.minus ||
         ch === CharacterCodes.dot ||
         ch === CharacterCodes.exclamation ||
         ch === CharacterCodes.greaterThan ||
         ch === CharacterCodes.lessThan ||
         ch === CharacterCodes.tilde ||
         ch === CharacterCodes.bar;
}
