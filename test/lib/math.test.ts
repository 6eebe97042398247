import { expect } from 'chai';

import { isPrime } from '../../src/lib/math';

const sieve = (max: number): boolean[] => {
  const primes = new Array<boolean>(max + 1).fill(true);
  primes[0] = false;
  primes[1] = false;
  for (let i = 2; i * i <= max; i++) {
    if (!primes[i]) continue;
    for (let j = i * i; j <= max; j += i) primes[j] = false;
  }
  return primes;
};

describe('isPrime', () => {
  it('should reject numbers below 2', () => {
    expect(isPrime(-7)).to.be.false;
    expect(isPrime(0)).to.be.false;
    expect(isPrime(1)).to.be.false;
  });

  it('should accept 2 and 3', () => {
    expect(isPrime(2)).to.be.true;
    expect(isPrime(3)).to.be.true;
  });

  it('should reject squares of primes', () => {
    expect(isPrime(4)).to.be.false;
    expect(isPrime(9)).to.be.false;
    expect(isPrime(49)).to.be.false;
    expect(isPrime(10201)).to.be.false; // 101 * 101
  });

  it('should match a sieve up to 10000', () => {
    const expected = sieve(10000);
    for (let n = 0; n <= 10000; n++) {
      expect(isPrime(n), `isPrime(${n})`).to.equal(expected[n]);
    }
  });

  it('should reject non integers', () => {
    expect(isPrime(2.5)).to.be.false;
    expect(isPrime(Number.NaN)).to.be.false;
  });
});
