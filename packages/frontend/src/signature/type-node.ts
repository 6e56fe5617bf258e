/**
 * Type tree produced from a debugger type signature
 */

export type ReferenceKind = "&" | "&&";

export type TypeQualifiers = {
  readonly isConst: boolean;
  readonly isVolatile: boolean;
  readonly pointerDepth: number;
  readonly reference?: ReferenceKind;
};

export type TypeNode = {
  /** Base name without namespace path (`tensor_descriptor`, `8192`, `unsigned long`) */
  readonly name: string;
  readonly args: readonly TypeNode[];
  /** True when the name was followed by an argument list, even an empty one */
  readonly templated: boolean;
  /** Stripped namespace path, outermost first */
  readonly scope: readonly string[];
  readonly qualifiers: TypeQualifiers;
  /** Enclosing type of a member typedef (`tensor_view<...>::TensorDesc`) */
  readonly owner?: TypeNode;
  /** Type of a C-style cast literal (`(ck_tile::address_space_enum)1`) */
  readonly cast?: TypeNode;
};

export const NO_QUALIFIERS: TypeQualifiers = {
  isConst: false,
  isVolatile: false,
  pointerDepth: 0,
};

/**
 * Build a node by hand; mostly useful in tests and for synthetic types.
 */
export const typeNode = (
  name: string,
  args: readonly TypeNode[] = [],
  extra: Partial<Omit<TypeNode, "name" | "args">> = {}
): TypeNode => ({
  name,
  args,
  templated: extra.templated ?? args.length > 0,
  scope: extra.scope ?? [],
  qualifiers: extra.qualifiers ?? NO_QUALIFIERS,
  ...(extra.owner ? { owner: extra.owner } : {}),
  ...(extra.cast ? { cast: extra.cast } : {}),
});

export const qualifiedName = (node: TypeNode): string =>
  [...node.scope, node.name].join("::");

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Integer held by a literal leaf, including cast literals.
 */
export const integerValue = (node: TypeNode): number | undefined =>
  node.args.length === 0 && INTEGER_PATTERN.test(node.name)
    ? Number.parseInt(node.name, 10)
    : undefined;

const CONSTANT_NAMES = new Set(["constant", "number", "integral_constant"]);

/**
 * Value of a compile-time constant type such as `constant<8192>` or
 * `integral_constant<int, 4>`.
 */
export const constantValue = (node: TypeNode): number | undefined => {
  if (!CONSTANT_NAMES.has(node.name)) {
    return undefined;
  }
  const last = node.args[node.args.length - 1];
  return last ? integerValue(last) : undefined;
};

/**
 * Values of a `sequence<...>` type; undefined when any member is not an
 * integer literal.
 */
export const sequenceValues = (
  node: TypeNode
): readonly number[] | undefined => {
  if (node.name !== "sequence") {
    return undefined;
  }
  const values: number[] = [];
  for (const arg of node.args) {
    const value = integerValue(arg);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }
  return values;
};

/**
 * First node named `name`, searching the tree depth first.
 */
export const findNode = (
  node: TypeNode,
  name: string
): TypeNode | undefined => {
  if (node.name === name) {
    return node;
  }
  for (const arg of node.args) {
    const found = findNode(arg, name);
    if (found) {
      return found;
    }
  }
  return undefined;
};
