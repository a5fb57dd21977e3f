/**
 * Gate parameters and parameter placeholders
 */

import { add, complex, isComplex, scale, toString, type Complex } from './complex';
import { ArityMismatchError } from './errors';

/**
 * Actual parameter value attached to an instruction
 */
export type Param = number | Complex;

/**
 * Placeholder `scale * params[param] + offset` over the parameters of the
 * enclosing gate
 */
export interface ParamRef {
  param: number;
  scale?: number;
  offset?: number;
}

/**
 * Parameter as written in a decomposition template or inverse rule
 */
export type ParamExpr = number | ParamRef;

export function paramRef(param: number, scaleBy = 1, offset = 0): ParamRef {
  return { param, scale: scaleBy, offset };
}

function lookup<T>(values: readonly T[], index: number): T {
  if (index < 0 || index >= values.length) {
    throw new ArityMismatchError(
      `parameter placeholder #${index} but only ${values.length} parameters given`
    );
  }
  return values[index];
}

/**
 * Bind a placeholder to concrete gate parameters
 */
export function evaluateParam(expr: ParamExpr, params: readonly Param[]): Param {
  if (typeof expr === 'number') {
    return expr;
  }
  const s = expr.scale ?? 1;
  const o = expr.offset ?? 0;
  const value = lookup(params, expr.param);
  if (isComplex(value)) {
    return add(scale(value, s), complex(o));
  }
  return s * value + o;
}

/**
 * Substitute `inner` into the placeholders of `outer`. The result refers to
 * whatever `inner` refers to, so linear placeholders compose.
 */
export function composeParam(outer: ParamExpr, inner: readonly ParamExpr[]): ParamExpr {
  if (typeof outer === 'number') {
    return outer;
  }
  const s = outer.scale ?? 1;
  const o = outer.offset ?? 0;
  const target = lookup(inner, outer.param);
  if (typeof target === 'number') {
    return s * target + o;
  }
  return {
    param: target.param,
    scale: s * (target.scale ?? 1),
    offset: s * (target.offset ?? 0) + o,
  };
}

export function formatParam(param: Param): string {
  return isComplex(param) ? toString(param) : `${param}`;
}
