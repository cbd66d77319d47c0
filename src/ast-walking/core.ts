/** Functions called by name like user functions, but not stored in the environment */
export type NativeFunc = {
  type: "NativeFunc";
  arity: number;
  fn: (...args: number[]) => number;
};

export const nativeFuncs: ReadonlyMap<string, NativeFunc> = new Map<string, NativeFunc>([
  ["sq", { type: "NativeFunc", arity: 1, fn: (x) => x * x }],
  ["sqrt", { type: "NativeFunc", arity: 1, fn: (x) => Math.sqrt(x) }],
  ["cube", { type: "NativeFunc", arity: 1, fn: (x) => x * x * x }],
  ["cbrt", { type: "NativeFunc", arity: 1, fn: (x) => Math.cbrt(x) }],
  ["abs", { type: "NativeFunc", arity: 1, fn: (x) => Math.abs(x) }],
  ["max", { type: "NativeFunc", arity: 2, fn: (a, b) => Math.max(a, b) }],
  ["min", { type: "NativeFunc", arity: 2, fn: (a, b) => Math.min(a, b) }],
]);
