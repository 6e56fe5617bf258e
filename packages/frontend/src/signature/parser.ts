/**
 * Recursive-descent parser for debugger type signatures
 *
 * Turns strings such as
 * `ck_tile::tuple<ck_tile::tensor_view<ck_tile::buffer_view<...>, ...>>`
 * into a TypeNode tree. Commas split arguments only at the current
 * bracket depth. Output cut short by the debugger (ending in `...`) is
 * closed implicitly and reported as incomplete.
 */

import { Result, ok, error } from "../types/result.js";
import { ParseError, parseError } from "../types/errors.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { Token, TokenKind, tokenize } from "./tokenizer.js";
import {
  NO_QUALIFIERS,
  ReferenceKind,
  TypeNode,
  TypeQualifiers,
} from "./type-node.js";

export type ParsedSignature = {
  readonly tree: TypeNode;
  /** False when the input was truncated or irregular parts were absorbed */
  readonly complete: boolean;
  readonly diagnostics: readonly Diagnostic[];
};

type ParserState = {
  readonly input: string;
  readonly tokens: readonly Token[];
  index: number;
  readonly irregularities: string[];
};

const ELABORATED_KEYWORDS = new Set([
  "struct",
  "class",
  "union",
  "enum",
  "typename",
]);

const CLOSERS: Partial<Record<TokenKind, TokenKind>> = {
  "close-angle": "open-angle",
  "close-paren": "open-paren",
};

const BRACKET_TEXT: Partial<Record<TokenKind, string>> = {
  "open-angle": "<",
  "open-paren": "(",
};

/**
 * Verify bracket balance up front. Returns the number of brackets left
 * open at the end of input.
 */
const checkBalance = (
  input: string,
  tokens: readonly Token[]
): Result<readonly Token[], ParseError> => {
  const open: Token[] = [];

  for (const token of tokens) {
    if (token.kind === "open-angle" || token.kind === "open-paren") {
      open.push(token);
      continue;
    }
    const opener = CLOSERS[token.kind];
    if (!opener) {
      continue;
    }
    const top = open.pop();
    if (!top) {
      return error(
        parseError(
          "TP1002",
          `'${token.text}' at position ${token.position} has no matching opener`,
          token.position,
          input
        )
      );
    }
    if (top.kind !== opener) {
      return error(
        parseError(
          "TP1002",
          `'${token.text}' at position ${token.position} closes '${BRACKET_TEXT[top.kind] ?? top.text}' opened at position ${top.position}`,
          token.position,
          input
        )
      );
    }
  }

  return ok(open);
};

const peek = (state: ParserState): Token | undefined =>
  state.tokens[state.index];

const peekKind = (state: ParserState): TokenKind | undefined =>
  peek(state)?.kind;

const advance = (state: ParserState): Token | undefined => {
  const token = state.tokens[state.index];
  state.index += 1;
  return token;
};

const isKeyword = (token: Token | undefined, words: ReadonlySet<string>) =>
  token?.kind === "identifier" && words.has(token.text);

const QUALIFIER_KEYWORDS = new Set(["const", "volatile"]);

const irregular = (state: ParserState, message: string): void => {
  state.irregularities.push(message);
};

/**
 * Consume a balanced bracket group starting at the current token and
 * return its source text.
 */
const consumeGroup = (state: ParserState): string => {
  const first = peek(state);
  if (!first) {
    return "";
  }
  let depth = 0;
  let last = first;
  while (state.index < state.tokens.length) {
    const token = advance(state);
    if (!token) {
      break;
    }
    last = token;
    if (token.kind === "open-angle" || token.kind === "open-paren") {
      depth += 1;
    } else if (token.kind === "close-angle" || token.kind === "close-paren") {
      depth -= 1;
    }
    if (depth <= 0) {
      break;
    }
  }
  return state.input.slice(first.position, last.end).replace(/\s+/g, " ");
};

/**
 * Base name: a literal, or one or more words (`unsigned long int`).
 */
const parseSimpleName = (state: ParserState): string => {
  const first = peek(state);

  if (first?.kind === "number") {
    advance(state);
    return first.text;
  }

  const words: string[] = [];
  for (;;) {
    const token = peek(state);
    if (!token) {
      break;
    }
    if (token.kind === "identifier") {
      if (QUALIFIER_KEYWORDS.has(token.text)) {
        break;
      }
      advance(state);
      if (!ELABORATED_KEYWORDS.has(token.text)) {
        words.push(token.text);
      }
      continue;
    }
    if (token.kind === "other" && words.length === 0) {
      advance(state);
      irregular(state, `unexpected '${token.text}' at position ${token.position}`);
      words.push(token.text);
      continue;
    }
    break;
  }

  if (words.length === 0) {
    const token = peek(state);
    irregular(
      state,
      token
        ? `missing type name before '${token.text}' at position ${token.position}`
        : "missing type name at end of input"
    );
  }

  return words.join(" ");
};

const skipStray = (
  state: ParserState,
  stopAt: ReadonlySet<TokenKind>
): void => {
  for (;;) {
    const token = peek(state);
    if (!token || stopAt.has(token.kind)) {
      return;
    }
    if (token.kind === "open-angle" || token.kind === "open-paren") {
      const text = consumeGroup(state);
      irregular(state, `unexpected '${text}' at position ${token.position}`);
      continue;
    }
    advance(state);
    irregular(state, `unexpected '${token.text}' at position ${token.position}`);
  }
};

const ARGUMENT_STOPS: ReadonlySet<TokenKind> = new Set([
  "comma",
  "close-angle",
]);

const parseArguments = (state: ParserState): readonly TypeNode[] => {
  advance(state);
  const args: TypeNode[] = [];

  for (;;) {
    const kind = peekKind(state);
    if (kind === undefined) {
      // Truncated input: close implicitly.
      return args;
    }
    if (kind === "close-angle") {
      advance(state);
      return args;
    }
    if (kind === "comma") {
      const comma = advance(state);
      irregular(state, `empty argument at position ${comma?.position ?? 0}`);
      continue;
    }

    args.push(parseType(state));
    skipStray(state, ARGUMENT_STOPS);

    if (peekKind(state) === "comma") {
      advance(state);
      if (peekKind(state) === "close-angle") {
        irregular(state, "empty trailing argument");
      }
    }
  }
};

/**
 * Dotted path with optional argument lists; `A<...>::B` makes `A<...>` the
 * owner of `B`.
 */
const parseNamePath = (
  state: ParserState,
  initialScope: readonly string[]
): TypeNode => {
  let scope: string[] = [...initialScope];
  let owner: TypeNode | undefined;

  if (peekKind(state) === "scope") {
    advance(state);
  }

  for (;;) {
    const name = parseSimpleName(state);
    const templated = peekKind(state) === "open-angle";
    const args = templated ? parseArguments(state) : [];
    const node: TypeNode = {
      name,
      args,
      templated,
      scope,
      qualifiers: NO_QUALIFIERS,
      ...(owner ? { owner } : {}),
    };

    if (peekKind(state) !== "scope") {
      return node;
    }
    advance(state);

    if (templated) {
      owner = node;
      scope = [];
    } else {
      scope = [...scope, name];
    }
  }
};

const CAST_STOPS: ReadonlySet<TokenKind> = new Set(["close-paren"]);

/**
 * `(T)value` cast literal, `(anonymous namespace)::X`, or a plain
 * parenthesized type.
 */
const parseParenthesized = (state: ParserState): TypeNode => {
  const open = advance(state);
  const inner = parseType(state);
  skipStray(state, CAST_STOPS);
  if (peekKind(state) === "close-paren") {
    advance(state);
  }

  const next = peek(state);
  if (next?.kind === "number") {
    advance(state);
    return {
      name: next.text,
      args: [],
      templated: false,
      scope: [],
      qualifiers: NO_QUALIFIERS,
      cast: inner,
    };
  }
  if (next?.kind === "scope") {
    advance(state);
    return parseNamePath(state, [`(${serializeTypeNode(inner)})`]);
  }

  irregular(
    state,
    `parenthesized type at position ${open?.position ?? 0}`
  );
  return inner;
};

const parseType = (state: ParserState): TypeNode => {
  let isConst = false;
  let isVolatile = false;

  for (;;) {
    const token = peek(state);
    if (token?.kind !== "identifier") {
      break;
    }
    if (token.text === "const") {
      isConst = true;
    } else if (token.text === "volatile") {
      isVolatile = true;
    } else if (!ELABORATED_KEYWORDS.has(token.text)) {
      break;
    }
    advance(state);
  }

  let node =
    peekKind(state) === "open-paren"
      ? parseParenthesized(state)
      : parseNamePath(state, []);

  let pointerDepth = node.qualifiers.pointerDepth;
  let reference: ReferenceKind | undefined = node.qualifiers.reference;
  isConst = isConst || node.qualifiers.isConst;
  isVolatile = isVolatile || node.qualifiers.isVolatile;

  for (;;) {
    const token = peek(state);
    if (!token) {
      break;
    }
    if (isKeyword(token, QUALIFIER_KEYWORDS)) {
      advance(state);
      if (token.text === "const") {
        isConst = true;
      } else {
        isVolatile = true;
      }
    } else if (token.kind === "star") {
      advance(state);
      pointerDepth += 1;
    } else if (token.kind === "amp") {
      advance(state);
      const second = peek(state);
      if (second?.kind === "amp" && second.position === token.end) {
        advance(state);
        reference = "&&";
      } else {
        reference = "&";
      }
    } else if (token.kind === "open-square" || token.kind === "open-paren") {
      // Array extents and function signatures stay part of the name.
      const text =
        token.kind === "open-paren" ? consumeGroup(state) : consumeSquare(state);
      node = { ...node, name: `${node.name}${text}` };
      if (token.kind === "open-paren") {
        irregular(state, `function type at position ${token.position}`);
      }
    } else if (token.kind === "ellipsis") {
      advance(state);
      node = { ...node, name: `${node.name}...` };
      irregular(state, `pack expansion at position ${token.position}`);
    } else {
      break;
    }
  }

  const qualifiers: TypeQualifiers = {
    isConst,
    isVolatile,
    pointerDepth,
    ...(reference ? { reference } : {}),
  };
  return { ...node, qualifiers };
};

const consumeSquare = (state: ParserState): string => {
  const first = peek(state);
  if (!first) {
    return "";
  }
  let last = first;
  while (state.index < state.tokens.length) {
    const token = advance(state);
    if (!token) {
      break;
    }
    last = token;
    if (token.kind === "close-square") {
      break;
    }
  }
  return state.input.slice(first.position, last.end).replace(/\s+/g, "");
};

/**
 * Parse a type signature into a TypeNode tree.
 */
export const parseTypeSignature = (
  input: string
): Result<ParsedSignature, ParseError> => {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return error(parseError("TP1001", "empty type signature", 0, input));
  }

  const allTokens = tokenize(input);
  const balance = checkBalance(input, allTokens);
  if (!balance.ok) {
    return balance;
  }

  const lastToken = allTokens[allTokens.length - 1];
  const truncated = lastToken?.kind === "ellipsis";
  const unclosed = balance.value[0];
  if (unclosed && !truncated) {
    return error(
      parseError(
        "TP1002",
        `'${unclosed.text}' opened at position ${unclosed.position} is never closed`,
        unclosed.position,
        input
      )
    );
  }

  const state: ParserState = {
    input,
    tokens: truncated ? allTokens.slice(0, -1) : allTokens,
    index: 0,
    irregularities: [],
  };

  const tree = parseType(state);
  const rest = peek(state);
  if (rest) {
    irregular(
      state,
      `unexpected trailing text '${input.slice(rest.position).trim()}'`
    );
  }

  const diagnostics: Diagnostic[] = [];
  if (truncated) {
    diagnostics.push(
      createDiagnostic(
        "TP1003",
        "warning",
        unclosed
          ? `type signature is truncated; ${balance.value.length} bracket(s) closed implicitly`
          : "type signature is truncated"
      )
    );
  }
  for (const message of state.irregularities) {
    diagnostics.push(createDiagnostic("TP1004", "warning", message));
  }

  return ok({
    tree,
    complete: diagnostics.length === 0,
    diagnostics,
  });
};

/**
 * Print a tree back as a normalized signature.
 */
export const serializeTypeNode = (node: TypeNode): string => {
  const { qualifiers } = node;
  const prefix = `${qualifiers.isConst ? "const " : ""}${qualifiers.isVolatile ? "volatile " : ""}`;
  const path = [...node.scope, node.name].join("::");
  const base = node.cast
    ? `(${serializeTypeNode(node.cast)})${node.name}`
    : node.owner
      ? `${serializeTypeNode(node.owner)}::${path}`
      : path;
  const args = node.templated
    ? `<${node.args.map(serializeTypeNode).join(", ")}>`
    : "";
  const suffix = `${"*".repeat(qualifiers.pointerDepth)}${qualifiers.reference ?? ""}`;
  return `${prefix}${base}${args}${suffix}`;
};
