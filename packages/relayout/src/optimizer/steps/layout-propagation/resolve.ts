import * as Ir from "#ir";

import type { LayoutMap } from "./layout-map.js";

/**
 * Reduce every candidate set to a single layout. Memory operations prefer a
 * generic layout, everything else an accelerator layout; the first
 * candidate wins otherwise.
 */
export function resolveConflicts(map: LayoutMap): void {
  for (const [value, info] of map) {
    if (info.size <= 1) continue;

    const candidates = info.layouts;
    const def = Ir.Value.definingOp(value);
    const preferGeneric =
      def !== undefined &&
      (def.kind === "load" ||
        def.kind === "store" ||
        def.kind === "atomic_rmw" ||
        def.kind === "atomic_cas");

    const preferred = candidates.find((layout) =>
      preferGeneric
        ? Ir.Layout.isGeneric(layout)
        : Ir.Layout.isAccelerator(layout),
    );
    info.pick(preferred ?? candidates[0]);
  }
}
