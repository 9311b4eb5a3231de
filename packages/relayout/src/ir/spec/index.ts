export { Type } from "./type.js";
export { Layout } from "./layout.js";
export { Value } from "./value.js";
export { Operation } from "./operation.js";
export { Region } from "./region.js";
export { Function } from "./function.js";
export { Module } from "./module.js";
