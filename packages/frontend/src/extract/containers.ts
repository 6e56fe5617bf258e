/**
 * Generic containers: tuple, array, multi_index, thread_buffer
 *
 * An empty container has `elements = ok([])`; one whose storage cannot be
 * read has an error there. The two must never look alike. A tuple with no
 * runtime storage takes its elements from its type arguments.
 */

import { Result, ok, error } from "../types/result.js";
import { AccessFailure, accessFailure } from "../types/errors.js";
import { TypeNode, constantValue } from "../signature/type-node.js";
import { serializeTypeNode } from "../signature/parser.js";
import { LiveValue, takeElements, typeOnlyValue } from "../value/live-value.js";
import {
  DEFAULT_EXTRACT_OPTIONS,
  ExtractOptions,
  Extraction,
  accessDiagnostics,
  valueType,
} from "./common.js";
import { declaredLength } from "./integers.js";

export type ContainerKind = "tuple" | "array" | "multi_index" | "thread_buffer";

export type ContainerElement =
  | { readonly kind: "constant"; readonly value: number }
  | {
      readonly kind: "value";
      /** Declared element type, when the container type names one */
      readonly type: TypeNode | undefined;
      readonly value: Result<LiveValue, AccessFailure>;
    };

export type Container = {
  readonly kind: ContainerKind;
  readonly elementType?: TypeNode;
  /** Declared size, when the type carries one */
  readonly size?: number;
  readonly elements: Result<readonly ContainerElement[], AccessFailure>;
  /** More elements exist than were read */
  readonly truncated: boolean;
};

const CONTAINER_KINDS: ReadonlySet<string> = new Set([
  "tuple",
  "array",
  "multi_index",
  "thread_buffer",
]);

export const isContainerKind = (name: string): name is ContainerKind =>
  CONTAINER_KINDS.has(name);

const extractTuple = (
  value: LiveValue,
  node: TypeNode | undefined,
  options: ExtractOptions
): Extraction<Container> => {
  const args = node?.templated ? node.args : undefined;
  const constants = args?.map(constantValue);

  if (args && constants?.every((constant) => constant !== undefined)) {
    return {
      model: {
        kind: "tuple",
        size: args.length,
        elements: ok(
          constants.map((constant): ContainerElement => ({
            kind: "constant",
            value: constant ?? 0,
          }))
        ),
        truncated: false,
      },
      diagnostics: [],
    };
  }

  const taken = takeElements(value, options.maxElements);
  if (!taken.ok && taken.error.reason === "no-storage" && args) {
    return {
      model: {
        kind: "tuple",
        size: args.length,
        elements: ok(
          args.slice(0, options.maxElements).map(
            (arg, index): ContainerElement => {
              const constant = constants?.[index];
              return constant !== undefined
                ? { kind: "constant", value: constant }
                : {
                    kind: "value",
                    type: arg,
                    value: ok(
                      typeOnlyValue(serializeTypeNode(arg), `${value.path}[${index}]`)
                    ),
                  };
            }
          )
        ),
        truncated: args.length > options.maxElements,
      },
      diagnostics: [],
    };
  }
  if (!taken.ok) {
    return {
      model: {
        kind: "tuple",
        ...(args ? { size: args.length } : {}),
        elements: taken,
        truncated: false,
      },
      diagnostics: accessDiagnostics(taken.error),
    };
  }

  const { items } = taken.value;
  const count = Math.min(
    Math.max(args?.length ?? 0, items.length),
    options.maxElements
  );
  const elements: ContainerElement[] = [];
  for (let index = 0; index < count; index += 1) {
    const constant = constants?.[index];
    if (constant !== undefined) {
      elements.push({ kind: "constant", value: constant });
      continue;
    }
    elements.push({
      kind: "value",
      type: args?.[index],
      value:
        items[index] ??
        error(
          accessFailure(
            `${value.path}[${index}]`,
            "unavailable",
            "element is missing from storage"
          )
        ),
    });
  }

  return {
    model: {
      kind: "tuple",
      ...(args ? { size: args.length } : {}),
      elements: ok(elements),
      truncated: taken.value.truncated || (args?.length ?? 0) > count,
    },
    diagnostics: [],
  };
};

const extractStorage = (
  kind: Exclude<ContainerKind, "tuple">,
  value: LiveValue,
  node: TypeNode | undefined,
  options: ExtractOptions
): Extraction<Container> => {
  const elementType = kind === "multi_index" ? undefined : node?.args[0];
  const size = node ? declaredLength(node) : undefined;
  const data = value.field("data");
  const source = data.ok ? data.value : value;
  const limit = Math.min(size ?? options.maxElements, options.maxElements);

  const taken = takeElements(source, limit);
  const shape = {
    kind,
    ...(elementType ? { elementType } : {}),
    ...(size !== undefined ? { size } : {}),
  };

  if (!taken.ok) {
    return {
      model: { ...shape, elements: taken, truncated: false },
      diagnostics: accessDiagnostics(taken.error),
    };
  }

  return {
    model: {
      ...shape,
      elements: ok(
        taken.value.items.map(
          (item): ContainerElement => ({
            kind: "value",
            type: elementType,
            value: item,
          })
        )
      ),
      truncated: taken.value.truncated || (size ?? 0) > limit,
    },
    diagnostics: [],
  };
};

export const extractContainer = (
  value: LiveValue,
  type?: TypeNode,
  options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS
): Extraction<Container> => {
  const resolved = type ? ok<TypeNode, AccessFailure>(type) : valueType(value);
  const node = resolved.ok ? resolved.value : undefined;
  const kind = node && isContainerKind(node.name) ? node.name : "tuple";

  return kind === "tuple"
    ? extractTuple(value, node, options)
    : extractStorage(kind, value, node, options);
};
