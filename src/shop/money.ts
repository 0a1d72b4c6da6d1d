// Rounds a monetary value to 2 decimal places (half away from zero for positive amounts).
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function lineTotal(line: { price: number; quantity: number }): number {
  return line.price * line.quantity;
}
