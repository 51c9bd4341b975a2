/**
 * Runtime value representations for the Rite interpreter.
 */

export type RiteValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'none' };

export type ValueKind = RiteValue['kind'];

// ---- Value constructors ----

export function mkString(value: string): RiteValue {
  return { kind: 'string', value };
}

export function mkNumber(value: number): RiteValue {
  return { kind: 'number', value };
}

export function mkBool(value: boolean): RiteValue {
  return { kind: 'bool', value };
}

export function mkNone(): RiteValue {
  return { kind: 'none' };
}

// ---- Value utilities ----

export function isTruthy(v: RiteValue): boolean {
  switch (v.kind) {
    case 'none': return false;
    case 'bool': return v.value;
    default: return true;
  }
}

/**
 * Canonical text of a value, as written by print and by string concatenation.
 */
export function valueToString(v: RiteValue): string {
  switch (v.kind) {
    case 'string': return v.value;
    case 'number': return String(v.value);
    case 'bool': return String(v.value);
    case 'none': return 'none';
  }
}

export function valuesEqual(a: RiteValue, b: RiteValue): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
  }
}

/**
 * Human-readable type name, used in error messages and the REPL.
 */
export function typeName(v: RiteValue): string {
  switch (v.kind) {
    case 'string': return 'String';
    case 'number': return 'Number';
    case 'bool': return 'Boolean';
    case 'none': return 'None';
  }
}
