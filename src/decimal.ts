import Decimal from "decimal.js-light";

// Two full registers multiplied still fit; quotients and roots truncate.
Decimal.set({ precision: 64, rounding: Decimal.ROUND_DOWN });

export { Decimal };
