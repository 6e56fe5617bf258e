/**
 * Dimension-flow validation
 *
 * Walking transforms in storage order, every lower id must already exist
 * (a bottom id or the upper id of an earlier transform), and no id may be
 * produced twice. Top ids must be reachable.
 */

import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import type { Descriptor } from "./descriptor.js";

const flowWarning = (message: string, path: string): Diagnostic =>
  createDiagnostic("TP3003", "warning", message, path);

export const validateDimensionFlow = (
  descriptor: Descriptor,
  path = "descriptor"
): readonly Diagnostic[] => {
  const { transforms, bottomDimensionIds, topDimensionIds } = descriptor;
  if (!transforms.ok || !bottomDimensionIds.ok) {
    return [];
  }

  const diagnostics: Diagnostic[] = [];
  const available = new Set(bottomDimensionIds.value);
  const producedBy = new Map<number, number>();
  const laterProducers = new Map<number, number>();

  transforms.value.forEach((transform, index) => {
    for (const id of transform.upperDims) {
      if (!laterProducers.has(id)) {
        laterProducers.set(id, index);
      }
    }
  });

  transforms.value.forEach((transform, index) => {
    if (transform.failure) {
      return;
    }
    const where = `${path}.transforms_[${index}]`;

    for (const id of transform.lowerDims) {
      if (available.has(id)) {
        continue;
      }
      const producer = laterProducers.get(id);
      diagnostics.push(
        flowWarning(
          producer !== undefined && producer > index
            ? `${transform.name} reads dimension ${id} before transform [${producer}] produces it`
            : `${transform.name} reads dimension ${id}, which no transform produces`,
          where
        )
      );
    }

    for (const id of transform.upperDims) {
      const previous = producedBy.get(id);
      if (previous !== undefined) {
        diagnostics.push(
          flowWarning(
            `dimension ${id} is produced by both transform [${previous}] and transform [${index}]`,
            where
          )
        );
        continue;
      }
      if (bottomDimensionIds.value.includes(id)) {
        diagnostics.push(
          flowWarning(`${transform.name} produces bottom dimension ${id}`, where)
        );
      }
      producedBy.set(id, index);
      available.add(id);
    }
  });

  if (topDimensionIds.ok) {
    for (const id of topDimensionIds.value) {
      if (!available.has(id)) {
        diagnostics.push(
          flowWarning(`top dimension ${id} is never produced`, path)
        );
      }
    }
  }

  return diagnostics;
};
