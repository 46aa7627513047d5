/**
 * Complex arithmetic for polynomial root finding.
 * All operations are pure functions on {re, im} pairs.
 */

export interface Complex {
  re: number;
  im: number;
}

export function complex(re: number, im = 0): Complex {
  return { re, im };
}

export function cadd(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function csub(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

export function cmul(a: Complex, b: Complex): Complex {
  return { re: a.re * b.re - a.im * b.im, im: a.re * b.im + a.im * b.re };
}

export function cdiv(a: Complex, b: Complex): Complex {
  const d = b.re * b.re + b.im * b.im;
  if (d === 0) throw new RangeError("Complex division by zero");
  return {
    re: (a.re * b.re + a.im * b.im) / d,
    im: (a.im * b.re - a.re * b.im) / d,
  };
}

export function cabs(a: Complex): number {
  return Math.hypot(a.re, a.im);
}

/** Horner evaluation; coefficients in descending powers. */
export function polyval(coefficients: readonly number[], z: Complex): Complex {
  let acc = complex(0);
  for (const c of coefficients) {
    acc = cadd(cmul(acc, z), complex(c));
  }
  return acc;
}
