/**
 * @file src/lib/math.ts
 * @description Primality check by trial division
 */

export const isPrime = (n: number): boolean => {
  if (!Number.isInteger(n) || n < 2) return false;
  if (n === 2 || n === 3) return true;

  const limit = Math.floor(Math.sqrt(n));
  for (let i = 2; i <= limit; i++) {
    if (n % i === 0) return false;
  }
  return true;
};
