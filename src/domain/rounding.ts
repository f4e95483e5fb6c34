/**
 * Round to the given number of decimals, sending exact halves to the even
 * neighbour (2.5 -> 2, 3.5 -> 4).
 */
export function roundHalfEven(value: number, decimals: number = 0): number {
  const factor = Math.pow(10, decimals);
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }

  return rounded / factor;
}
