/**
 * Value access adapter
 *
 * A HostValue is whatever the debugger hands over; any of its members may
 * throw. createLiveValue wraps it so that every access returns a Result
 * and failures carry the access path that produced them.
 */

import { Result, ok, error, attempt } from "../types/result.js";
import {
  AccessFailure,
  AccessFailureReason,
  accessFailure,
} from "../types/errors.js";

export type ScalarValue = number | bigint | boolean | string;

export type HostValue = {
  readonly typeName: () => string;
  readonly field: (name: string) => HostValue;
  readonly deref: () => HostValue;
  readonly elements: () => Iterable<HostValue>;
  readonly scalar: () => ScalarValue;
  readonly fieldNames: () => readonly string[];
};

/**
 * Thrown by hosts to say why a value cannot be read. Any other throw is
 * reported as `unavailable`.
 */
export class HostAccessError extends Error {
  readonly reason: AccessFailureReason;

  constructor(reason: AccessFailureReason, message: string) {
    super(message);
    this.name = "HostAccessError";
    this.reason = reason;
  }
}

export type LiveValue = {
  /** Access path from the inspected root, e.g. `window.bottom_tensor_view_` */
  readonly path: string;
  readonly typeString: () => Result<string, AccessFailure>;
  readonly field: (name: string) => Result<LiveValue, AccessFailure>;
  readonly deref: () => Result<LiveValue, AccessFailure>;
  /**
   * Lazy, finite element sequence. Each call starts over. A failure to
   * reach the collection itself is yielded once as an error.
   */
  readonly elements: () => Iterable<Result<LiveValue, AccessFailure>>;
  readonly scalar: () => Result<ScalarValue, AccessFailure>;
  readonly fieldNames: () => Result<readonly string[], AccessFailure>;
};

const toFailure =
  (path: string) =>
  (thrown: unknown): AccessFailure =>
    thrown instanceof HostAccessError
      ? accessFailure(path, thrown.reason, thrown.message)
      : accessFailure(
          path,
          "unavailable",
          thrown instanceof Error ? thrown.message : String(thrown)
        );

function* iterateElements(
  host: HostValue,
  path: string
): Generator<Result<LiveValue, AccessFailure>> {
  const iterator = attempt(
    () => host.elements()[Symbol.iterator](),
    toFailure(path)
  );
  if (!iterator.ok) {
    yield iterator;
    return;
  }
  const source = iterator.value;

  for (let index = 0; ; index += 1) {
    const elementPath = `${path}[${index}]`;
    const step = attempt(() => source.next(), toFailure(elementPath));
    if (!step.ok) {
      yield step;
      return;
    }
    const next = step.value;
    if (next.done) {
      return;
    }
    yield ok(createLiveValue(next.value, elementPath));
  }
}

export const createLiveValue = (host: HostValue, path = "value"): LiveValue => ({
  path,
  typeString: () => attempt(() => host.typeName(), toFailure(path)),
  field: (name) => {
    const fieldPath = `${path}.${name}`;
    return attempt(
      () => createLiveValue(host.field(name), fieldPath),
      toFailure(fieldPath)
    );
  },
  deref: () => {
    const pointeePath = `(*${path})`;
    return attempt(
      () => createLiveValue(host.deref(), pointeePath),
      toFailure(pointeePath)
    );
  },
  elements: () => ({
    [Symbol.iterator]: () => iterateElements(host, path),
  }),
  scalar: () => attempt(() => host.scalar(), toFailure(path)),
  fieldNames: () => attempt(() => host.fieldNames(), toFailure(path)),
});

const noStorage = (what: string): never => {
  throw new HostAccessError(
    "no-storage",
    `${what} is not available without runtime storage`
  );
};

/**
 * A value known only by its type. Every runtime access fails with
 * `no-storage`, so renderers fall back to what the type carries.
 */
export const typeOnlyValue = (typeString: string, path = "type"): LiveValue =>
  createLiveValue(
    {
      typeName: () => typeString,
      field: (name) => noStorage(`field '${name}'`),
      deref: () => noStorage("pointee"),
      elements: () => noStorage("elements"),
      scalar: () => noStorage("scalar"),
      fieldNames: () => noStorage("field list"),
    },
    path
  );

/**
 * Materialize at most `limit` elements; `truncated` is set when more exist.
 */
export const takeElements = (
  value: LiveValue,
  limit: number
): Result<
  { readonly items: readonly Result<LiveValue, AccessFailure>[]; readonly truncated: boolean },
  AccessFailure
> => {
  const items: Result<LiveValue, AccessFailure>[] = [];
  let index = 0;
  for (const item of value.elements()) {
    if (index === 0 && !item.ok && item.error.path === value.path) {
      return error(item.error);
    }
    if (index >= limit) {
      return ok({ items, truncated: true });
    }
    items.push(item);
    index += 1;
  }
  return ok({ items, truncated: false });
};
