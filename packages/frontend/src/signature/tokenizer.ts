/**
 * Tokenizer for debugger type signatures
 */

export type TokenKind =
  | "identifier"
  | "number"
  | "scope"
  | "open-angle"
  | "close-angle"
  | "open-paren"
  | "close-paren"
  | "open-square"
  | "close-square"
  | "comma"
  | "star"
  | "amp"
  | "ellipsis"
  | "other";

export type Token = {
  readonly kind: TokenKind;
  /** Token text; numbers are normalized (suffix dropped, hex as decimal) */
  readonly text: string;
  readonly position: number;
  readonly end: number;
};

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenKind>> = {
  "<": "open-angle",
  ">": "close-angle",
  "(": "open-paren",
  ")": "close-paren",
  "[": "open-square",
  "]": "close-square",
  ",": "comma",
  "*": "star",
  "&": "amp",
};

const IDENTIFIER = /[A-Za-z_$~][A-Za-z0-9_$]*/y;
const NUMBER = /-?(?:0[xX]([0-9a-fA-F]+)|(\d+(?:\.\d+)?))[uUlLfF]*/y;
const WHITESPACE = /\s+/y;

const normalizeNumber = (match: RegExpExecArray): string => {
  const negative = match[0].startsWith("-");
  const hexDigits = match[1];
  const decimal = match[2] ?? "0";
  const magnitude =
    hexDigits !== undefined
      ? BigInt(`0x${hexDigits}`).toString()
      : decimal.includes(".")
        ? decimal
        : BigInt(decimal).toString();
  return negative && magnitude !== "0" ? `-${magnitude}` : magnitude;
};

const matchAt = (pattern: RegExp, input: string, position: number) => {
  pattern.lastIndex = position;
  return pattern.exec(input);
};

export const tokenize = (input: string): readonly Token[] => {
  const tokens: Token[] = [];
  let position = 0;

  while (position < input.length) {
    const space = matchAt(WHITESPACE, input, position);
    if (space) {
      position += space[0].length;
      continue;
    }

    const char = input.charAt(position);

    if (input.startsWith("::", position)) {
      tokens.push({ kind: "scope", text: "::", position, end: position + 2 });
      position += 2;
      continue;
    }

    if (input.startsWith("...", position)) {
      tokens.push({
        kind: "ellipsis",
        text: "...",
        position,
        end: position + 3,
      });
      position += 3;
      continue;
    }

    const number = /[-\d]/.test(char)
      ? matchAt(NUMBER, input, position)
      : null;
    if (number) {
      tokens.push({
        kind: "number",
        text: normalizeNumber(number),
        position,
        end: position + number[0].length,
      });
      position += number[0].length;
      continue;
    }

    const identifier = matchAt(IDENTIFIER, input, position);
    if (identifier) {
      tokens.push({
        kind: "identifier",
        text: identifier[0],
        position,
        end: position + identifier[0].length,
      });
      position += identifier[0].length;
      continue;
    }

    tokens.push({
      kind: SINGLE_CHAR_TOKENS[char] ?? "other",
      text: char,
      position,
      end: position + 1,
    });
    position += 1;
  }

  return tokens;
};
