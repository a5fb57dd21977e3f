/**
 * Complex number utilities for gate parameters.
 *
 * Most gate angles are real, but opaque operations may carry complex values
 * of the form a + bi.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

export function isComplex(value: unknown): value is Complex {
  return (
    typeof value === 'object' &&
    value !== null &&
    'real' in value &&
    'imag' in value &&
    typeof value.real === 'number' &&
    typeof value.imag === 'number'
  );
}

/**
 * Complex addition z1 + z2
 */
export function add(a: Complex, b: Complex): Complex {
  return {
    real: a.real + b.real,
    imag: a.imag + b.imag,
  };
}

/**
 * Scalar multiplication s * z
 */
export function scale(c: Complex, s: number): Complex {
  return {
    real: c.real * s,
    imag: c.imag * s,
  };
}

/**
 * Check if two complex numbers are approximately equal
 */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return (
    Math.abs(a.real - b.real) < tolerance && Math.abs(a.imag - b.imag) < tolerance
  );
}

/**
 * Format complex number as string, e.g. `0.5+0.25i`
 */
export function toString(c: Complex): string {
  const sign = c.imag >= 0 ? '+' : '-';
  return `${c.real}${sign}${Math.abs(c.imag)}i`;
}
