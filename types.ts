import deepEqual from 'deep-equal';
import debug from './util/debug';
import unhandled from './util/never';
import join from './util/join';

export type IntegerWidth = 8 | 16 | 24 | 32;
export type FixedPointEncoding = 'f8.8' | 'f.8' | 'f.16' | 'f16.8' | 'f8.16';

export type Integer = { kind: 'Integer'; bits: IntegerWidth; signed: boolean };
export type FixedPoint = { kind: 'FixedPoint'; encoding: FixedPointEncoding };
export type Boolean = { kind: 'Boolean' };
export type Void = { kind: 'Void' };
// Length-prefixed: { len: u16, data: pointer to bytes }. Only ever handled through pointers.
export type String = { kind: 'String' };
export type Pointer = { kind: 'Pointer'; to: Type };
export type FixedArray = { kind: 'Array'; of: Type; length: number };
// Only appears in generic templates, substituted away before lowering.
export type TypeParameter = { kind: 'TypeParameter'; name: string };

export type Type =
    | Integer
    | FixedPoint
    | Boolean
    | Void
    | String
    | Pointer
    | FixedArray
    | TypeParameter;

// Types that fit in a virtual register.
export type Scalar = Integer | FixedPoint | Boolean | Pointer;

const integer = (bits: IntegerWidth, signed: boolean): Integer => ({ kind: 'Integer', bits, signed });

export const builtinTypes = {
    u8: integer(8, false),
    u16: integer(16, false),
    u24: integer(24, false),
    u32: integer(32, false),
    i8: integer(8, true),
    i16: integer(16, true),
    i24: integer(24, true),
    i32: integer(32, true),
    bool: { kind: 'Boolean' } as const,
    void: { kind: 'Void' } as const,
    string: { kind: 'String' } as const,
};

export const fixed = (encoding: FixedPointEncoding): FixedPoint => ({ kind: 'FixedPoint', encoding });
export const pointerTo = (to: Type): Pointer => ({ kind: 'Pointer', to });
export const arrayOf = (of: Type, length: number): FixedArray => ({ kind: 'Array', of, length });
export const typeParameter = (name: string): TypeParameter => ({ kind: 'TypeParameter', name });

const fixedPointLayout: {
    [E in FixedPointEncoding]: { storageBits: IntegerWidth; usedBits: number; shift: 8 | 16 };
} = {
    'f8.8': { storageBits: 16, usedBits: 16, shift: 8 },
    'f.8': { storageBits: 8, usedBits: 8, shift: 8 },
    'f.16': { storageBits: 16, usedBits: 16, shift: 16 },
    'f16.8': { storageBits: 32, usedBits: 24, shift: 8 },
    'f8.16': { storageBits: 32, usedBits: 24, shift: 16 },
};

export const fixedPointShift = (type: FixedPoint): 8 | 16 => fixedPointLayout[type.encoding].shift;

export const equal = (a: Type, b: Type): boolean => deepEqual(a, b, { strict: true });

// Canonical short name, used in mangled symbols: u8, i24, f8_8, p_u8, a10_u16, bool, String.
export const shortName = (type: Type): string => {
    switch (type.kind) {
        case 'Integer':
            return `${type.signed ? 'i' : 'u'}${type.bits}`;
        case 'FixedPoint':
            return type.encoding.replace('.', '_');
        case 'Boolean':
            return 'bool';
        case 'Void':
            return 'void';
        case 'String':
            return 'String';
        case 'Pointer':
            return `p_${shortName(type.to)}`;
        case 'Array':
            return `a${type.length}_${shortName(type.of)}`;
        case 'TypeParameter':
            throw debug(`type parameter ${type.name} has no short name`);
        default:
            return unhandled(type, 'shortName');
    }
};

export const toString = (type: Type): string => {
    switch (type.kind) {
        case 'Pointer':
            return `*${toString(type.to)}`;
        case 'Array':
            return `[${type.length}]${toString(type.of)}`;
        case 'TypeParameter':
            return type.name;
        case 'FixedPoint':
            return type.encoding;
        default:
            return shortName(type);
    }
};

export const isScalar = (type: Type): type is Scalar =>
    type.kind == 'Integer' || type.kind == 'FixedPoint' || type.kind == 'Boolean' || type.kind == 'Pointer';

export const isNumeric = (type: Type): type is Integer | FixedPoint =>
    type.kind == 'Integer' || type.kind == 'FixedPoint';

// Bits that carry the value. Pointers are target sized, so null here.
export const valueBits = (type: Scalar): number | null => {
    switch (type.kind) {
        case 'Integer':
            return type.bits;
        case 'FixedPoint':
            return fixedPointLayout[type.encoding].usedBits;
        case 'Boolean':
            return 8;
        case 'Pointer':
            return null;
        default:
            return unhandled(type, 'valueBits');
    }
};

// Bits of storage a value of this type occupies; 24 bit values live in 32.
export const storageBits = (type: Scalar, pointerBits: number): number => {
    switch (type.kind) {
        case 'Integer':
            return type.bits == 24 ? 32 : type.bits;
        case 'FixedPoint':
            return fixedPointLayout[type.encoding].storageBits;
        case 'Boolean':
            return 8;
        case 'Pointer':
            return pointerBits;
        default:
            return unhandled(type, 'storageBits');
    }
};

export const isSigned = (type: Scalar): boolean => {
    switch (type.kind) {
        case 'Integer':
            return type.signed;
        case 'FixedPoint':
            return true;
        case 'Boolean':
        case 'Pointer':
            return false;
        default:
            return unhandled(type, 'isSigned');
    }
};

// Reduce an arbitrary integer to the value a register of this type holds, wrapping modulo 2^width.
export const wrap = (value: number, type: Scalar): number => {
    const bits = valueBits(type);
    if (bits === null) throw debug('wrap called on pointer');
    if (type.kind == 'Boolean') return value == 0 ? 0 : 1;
    const modulus = 2 ** bits;
    // || 0 turns -0 (from truncating division) into 0
    let unsigned = value % modulus || 0;
    if (unsigned < 0) unsigned += modulus;
    if (isSigned(type) && unsigned >= modulus / 2) {
        return unsigned - modulus;
    }
    return unsigned;
};

// Bytes a value of this type occupies in memory, for globals and array elements.
export const sizeInBytes = (type: Type, pointerBits: number): number => {
    switch (type.kind) {
        case 'Array':
            return type.length * sizeInBytes(type.of, pointerBits);
        case 'String':
            return 2 + pointerBits / 8;
        case 'Void':
            return 0;
        case 'TypeParameter':
            throw debug('size of unsubstituted type parameter');
        default:
            return storageBits(type, pointerBits) / 8;
    }
};

export const substitute = (type: Type, bindings: Map<string, Type>): Type => {
    switch (type.kind) {
        case 'TypeParameter': {
            const bound = bindings.get(type.name);
            if (!bound) throw debug(`unbound type parameter ${type.name}`);
            return bound;
        }
        case 'Pointer':
            return pointerTo(substitute(type.to, bindings));
        case 'Array':
            return arrayOf(substitute(type.of, bindings), type.length);
        default:
            return type;
    }
};

export const mentions = (type: Type, parameter: string): boolean => {
    switch (type.kind) {
        case 'TypeParameter':
            return type.name == parameter;
        case 'Pointer':
            return mentions(type.to, parameter);
        case 'Array':
            return mentions(type.of, parameter);
        default:
            return false;
    }
};

export const nestingDepth = (type: Type): number => {
    switch (type.kind) {
        case 'Pointer':
            return 1 + nestingDepth(type.to);
        case 'Array':
            return 1 + nestingDepth(type.of);
        default:
            return 0;
    }
};

export const listToString = (types: Type[]): string => join(types.map(toString), ', ');

// Encoding of the value 1, the step of increment and decrement.
export const one = (type: Integer | FixedPoint): number => (type.kind == 'FixedPoint' ? 2 ** fixedPointShift(type) : 1);
