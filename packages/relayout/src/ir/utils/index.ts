export {
  walk,
  collectOperations,
  programOrder,
  enclosingFunction,
  definingRegion,
  functionOf,
} from "./walk.js";
export { type Use, usesOf, usersOf, hasUses, useCounts } from "./uses.js";
