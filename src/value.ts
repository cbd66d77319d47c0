import { formatNumber, numberToInput } from "./utils.js";

// only numbers for now; tagged so more kinds can be added
export type Value = { type: "Num"; value: number };

export const num = (value: number): Value => ({ type: "Num", value });

export const formatValue = (v: Value): string => formatNumber(v.value);

/** The `let` line that rebinds `name` to `v` */
export const toInput = (name: string, v: Value): string =>
  `let ${name} = ${numberToInput(v.value)}`;
