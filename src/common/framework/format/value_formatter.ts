import { UnsupportedValueError } from '../errors.js';
import type { ParamValue } from '../params.js';
import { unreachable } from '../../util/util.js';

import { type NumberTemplate, applyNumberTemplate, parseNumberTemplate } from './number_format.js';

// Symbol.for, so tags made by a sweep file's own copy of this module are still recognized.
const kFloatTag = Symbol.for('argsweep.float');

/** A number marked to render through the float format even when it is integral. */
export class FloatValue {
  readonly value: number;

  constructor(value: number) {
    this.value = value;
    Object.defineProperty(this, kFloatTag, { value: true });
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * Marks `x` as a float: `param('lr', [float(1), 0.5])` renders both values with the float
 * format, where a plain `1` would render as `1`.
 */
export function float(x: number): FloatValue {
  return new FloatValue(x);
}

export function isFloatValue(x: unknown): x is FloatValue {
  return (
    typeof x === 'object' &&
    x !== null &&
    kFloatTag in x &&
    'value' in x &&
    typeof x.value === 'number'
  );
}

/**
 * The shapes of value a `ValueFormatter` knows how to render. Integral numbers are `other`
 * unless tagged with `float()`: only numbers with a fractional part (and NaN/Infinity) go
 * through the float format on their own.
 */
export type ParamValueShape =
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'list'; readonly value: readonly ParamValue[] }
  | { readonly kind: 'other'; readonly value: ParamValue };

export function classifyValue(value: ParamValue): ParamValueShape {
  if (isFloatValue(value)) {
    return { kind: 'float', value: value.value };
  }
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return { kind: 'float', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'list', value };
  }
  return { kind: 'other', value };
}

/** Renders one parameter value as a string. */
export abstract class ValueFormatter {
  abstract formatFloat(value: unknown): string;
  abstract formatList(value: unknown): string;

  /** Fallback for any other value. Throws whatever `String()` throws. */
  formatOther(value: ParamValue): string {
    return String(value);
  }

  format(value: ParamValue): string {
    const shape = classifyValue(value);
    switch (shape.kind) {
      case 'float':
        return this.formatFloat(shape.value);
      case 'list':
        return this.formatList(shape.value);
      case 'other':
        return this.formatOther(shape.value);
      default:
        return unreachable(`unknown value shape ${JSON.stringify(shape)}`);
    }
  }
}

export interface ArgparseValueFormatterOptions {
  /**
   * Template with one `{}` / `{:spec}` placeholder (e.g. `'{:.3f}'`), or a function.
   * Default: `'{}'`, plain string conversion.
   */
  floatFormat?: string | ((value: number) => string);
  /** Written before the entries of a list, e.g. `'('` or `'['`. */
  listOpen?: string;
  listClose?: string;
  listValueSep?: string;
}

/** A `ValueFormatter` whose output suits a command line read by an argparse-style parser. */
export class ArgparseValueFormatter extends ValueFormatter {
  readonly listOpen: string;
  readonly listClose: string;
  readonly listValueSep: string;
  private readonly floatFormatFn: (value: number) => string;

  constructor({
    floatFormat = '{}',
    listOpen = '',
    listClose = '',
    listValueSep = ', ',
  }: ArgparseValueFormatterOptions = {}) {
    super();
    if (typeof floatFormat === 'string') {
      const template: NumberTemplate = parseNumberTemplate(floatFormat);
      this.floatFormatFn = x => applyNumberTemplate(template, x);
    } else {
      this.floatFormatFn = floatFormat;
    }
    this.listOpen = listOpen;
    this.listClose = listClose;
    this.listValueSep = listValueSep;
  }

  formatFloat(value: unknown): string {
    if (typeof value !== 'number') {
      throw new UnsupportedValueError(`value should be a number. Was ${String(value)}`);
    }
    return this.floatFormatFn(value);
  }

  formatList(value: unknown): string {
    if (!Array.isArray(value)) {
      throw new UnsupportedValueError(`value should be a list. Was ${String(value)}`);
    }
    const entries = value.map(v => this.format(v));
    return this.listOpen + entries.join(this.listValueSep) + this.listClose;
  }
}
