/**
 * Snapshot host - a HostValue backed by a JSON value tree
 *
 * Snapshots stand in for a debugger: each node carries a type string and
 * optionally a scalar, named fields, elements or a pointee. A `status` of
 * `unavailable` or `optimizedOut` makes every runtime access throw, the
 * way a debugger does for values it cannot read.
 */

import { Result, ok, error } from "../types/result.js";
import { HostAccessError, HostValue, LiveValue, createLiveValue } from "./live-value.js";

export type SnapshotStatus = "unavailable" | "optimizedOut";

export type ValueSnapshot = {
  readonly type: string;
  readonly status?: SnapshotStatus;
  readonly value?: number | boolean | string;
  readonly fields?: Readonly<Record<string, ValueSnapshot>>;
  readonly elements?: readonly ValueSnapshot[];
  readonly pointee?: ValueSnapshot;
};

export type SnapshotDocument = {
  readonly values: Readonly<Record<string, ValueSnapshot>>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Own property lookup; names such as `toString` or `__proto__` are not
 * members of a snapshot unless the document declares them.
 */
export const ownEntry = <T>(
  record: Readonly<Record<string, T>>,
  name: string
): T | undefined => (Object.hasOwn(record, name) ? record[name] : undefined);

const validateNode = (
  raw: unknown,
  path: string
): Result<ValueSnapshot, string> => {
  if (!isRecord(raw)) {
    return error(`${path}: expected an object`);
  }
  if (typeof raw.type !== "string") {
    return error(`${path}: 'type' must be a string`);
  }

  let status: SnapshotStatus | undefined;
  if (raw.status !== undefined) {
    if (raw.status !== "unavailable" && raw.status !== "optimizedOut") {
      return error(`${path}: 'status' must be "unavailable" or "optimizedOut"`);
    }
    status = raw.status;
  }

  const value = raw.value;
  if (
    value !== undefined &&
    typeof value !== "number" &&
    typeof value !== "boolean" &&
    typeof value !== "string"
  ) {
    return error(`${path}: 'value' must be a number, boolean or string`);
  }

  let fields: Record<string, ValueSnapshot> | undefined;
  if (raw.fields !== undefined) {
    if (!isRecord(raw.fields)) {
      return error(`${path}: 'fields' must be an object`);
    }
    const entries: [string, ValueSnapshot][] = [];
    for (const [name, child] of Object.entries(raw.fields)) {
      const result = validateNode(child, `${path}.${name}`);
      if (!result.ok) {
        return result;
      }
      entries.push([name, result.value]);
    }
    fields = Object.fromEntries(entries);
  }

  let elements: ValueSnapshot[] | undefined;
  if (raw.elements !== undefined) {
    if (!Array.isArray(raw.elements)) {
      return error(`${path}: 'elements' must be an array`);
    }
    elements = [];
    for (const [index, child] of raw.elements.entries()) {
      const result = validateNode(child, `${path}[${index}]`);
      if (!result.ok) {
        return result;
      }
      elements.push(result.value);
    }
  }

  let pointee: ValueSnapshot | undefined;
  if (raw.pointee !== undefined) {
    const result = validateNode(raw.pointee, `(*${path})`);
    if (!result.ok) {
      return result;
    }
    pointee = result.value;
  }

  return ok({
    type: raw.type,
    ...(status ? { status } : {}),
    ...(value !== undefined ? { value } : {}),
    ...(fields ? { fields } : {}),
    ...(elements ? { elements } : {}),
    ...(pointee ? { pointee } : {}),
  });
};

export const parseSnapshotNode = (
  raw: unknown,
  path = "value"
): Result<ValueSnapshot, string> => validateNode(raw, path);

/**
 * Validate a parsed JSON document of the form `{ "values": { name: node } }`.
 */
export const parseSnapshotDocument = (
  raw: unknown
): Result<SnapshotDocument, string> => {
  if (!isRecord(raw) || !isRecord(raw.values)) {
    return error("snapshot document must be an object with a 'values' object");
  }

  const entries: [string, ValueSnapshot][] = [];
  for (const [name, node] of Object.entries(raw.values)) {
    const result = validateNode(node, name);
    if (!result.ok) {
      return result;
    }
    entries.push([name, result.value]);
  }
  return ok({ values: Object.fromEntries(entries) });
};

const failIfUnreadable = (snapshot: ValueSnapshot): void => {
  if (snapshot.status === "unavailable") {
    throw new HostAccessError("unavailable", "value is unavailable");
  }
  if (snapshot.status === "optimizedOut") {
    throw new HostAccessError("optimized-out", "value is optimized out");
  }
};

export const snapshotHost = (snapshot: ValueSnapshot): HostValue => ({
  typeName: () => snapshot.type,
  field: (name) => {
    failIfUnreadable(snapshot);
    const child = snapshot.fields && ownEntry(snapshot.fields, name);
    if (!child) {
      throw new HostAccessError(
        "missing-field",
        `no member named '${name}' in ${snapshot.type}`
      );
    }
    return snapshotHost(child);
  },
  deref: () => {
    failIfUnreadable(snapshot);
    if (!snapshot.pointee) {
      throw new HostAccessError("not-pointer", `${snapshot.type} is not a pointer`);
    }
    return snapshotHost(snapshot.pointee);
  },
  elements: () => {
    failIfUnreadable(snapshot);
    if (!snapshot.elements) {
      throw new HostAccessError(
        "not-iterable",
        `${snapshot.type} has no elements`
      );
    }
    return snapshot.elements.map(snapshotHost);
  },
  scalar: () => {
    failIfUnreadable(snapshot);
    if (snapshot.value === undefined) {
      throw new HostAccessError("not-scalar", `${snapshot.type} is not a scalar`);
    }
    return snapshot.value;
  },
  fieldNames: () => {
    failIfUnreadable(snapshot);
    return Object.keys(snapshot.fields ?? {});
  },
});

export const snapshotValue = (snapshot: ValueSnapshot, path = "value"): LiveValue =>
  createLiveValue(snapshotHost(snapshot), path);
