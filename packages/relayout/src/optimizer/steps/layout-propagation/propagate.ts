import * as Ir from "#ir";
import type { LayoutOracle } from "#layouts";

import type { LayoutMap } from "./layout-map.js";

/**
 * Push candidate layouts forward from the seeded values until no candidate
 * set grows
 */
export function propagateLayouts(
  func: Ir.Function,
  map: LayoutMap,
  oracle: LayoutOracle,
): void {
  const stack = map.values();
  while (stack.length > 0) {
    const value = stack.pop();
    if (!value) break;
    const info = map.get(value);
    if (!info) continue;
    // Users may add to this very value's set through a loop back-edge
    const snapshot = info.layouts;
    stack.push(...propagateToUsers(func, value, snapshot, map, oracle));
  }
}

/**
 * Values whose candidate set grew by following the uses of `value`
 */
export function propagateToUsers(
  func: Ir.Function,
  value: Ir.Value,
  candidates: Ir.Layout[],
  map: LayoutMap,
  oracle: LayoutOracle,
): Ir.Value[] {
  const changed: Ir.Value[] = [];
  const setEncoding = (values: Ir.Value[], user: Ir.Operation) =>
    changed.push(...addCandidates(values, candidates, user, map, oracle));

  for (const { owner: user, index } of Ir.Utils.usesOf(func, value)) {
    switch (user.kind) {
      case "for": {
        const slot = index - Ir.Operation.For.INIT_OFFSET;
        if (slot < 0) break;
        setEncoding(
          [Ir.Operation.For.iterArgs(user)[slot], user.results[slot]],
          user,
        );
        break;
      }
      case "while":
        setEncoding([Ir.Operation.While.before(user).arguments[index]], user);
        break;
      case "yield": {
        const parent = user.parent && Ir.Region.parentOp(user.parent);
        if (!parent) break;
        if (parent.kind === "for") {
          setEncoding(
            [parent.results[index], Ir.Operation.For.iterArgs(parent)[index]],
            user,
          );
        } else if (parent.kind === "if") {
          setEncoding([parent.results[index]], user);
        } else if (parent.kind === "while") {
          setEncoding(
            [
              Ir.Operation.While.before(parent).arguments[index],
              parent.operands[index],
            ],
            user,
          );
        }
        break;
      }
      case "condition": {
        // Operand 0 is the condition itself
        const parent = user.parent && Ir.Region.parentOp(user.parent);
        if (index < 1 || !parent || parent.kind !== "while") break;
        setEncoding(
          [
            Ir.Operation.While.after(parent).arguments[index - 1],
            parent.results[index - 1],
          ],
          user,
        );
        break;
      }
      default:
        if (Ir.Operation.isLayoutTransparent(user)) {
          setEncoding(user.results, user);
        }
    }
  }
  return changed;
}

/**
 * Add the destination of every candidate to each tensor value; returns the
 * values whose sets grew
 */
function addCandidates(
  values: (Ir.Value | undefined)[],
  candidates: Ir.Layout[],
  user: Ir.Operation,
  map: LayoutMap,
  oracle: LayoutOracle,
): Ir.Value[] {
  const changed: Ir.Value[] = [];
  for (const value of values) {
    if (!value || !Ir.Value.isTensor(value)) continue;
    let grew = false;
    for (const candidate of candidates) {
      // Conversions adopt their source layout so they can disappear
      const destination =
        user.kind === "convert_layout"
          ? candidate
          : oracle.inferDestinationLayout(user, candidate);
      if (destination) {
        grew = map.infoFor(value).add(destination) || grew;
      }
    }
    if (grew) {
      changed.push(value);
    }
  }
  return changed;
}
