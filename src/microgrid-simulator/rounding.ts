// Rounds to a fixed number of decimals; halves go towards +Infinity, as with Math.round
export const roundTo = (value: number, decimals: number): number => {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};
