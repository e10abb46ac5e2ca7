import { Register, toString as s } from './Register';
import { FunctionSymbol, symbolToString } from './FunctionSymbol';
import { RuntimeFunctionName } from './runtime';
import { Comparison } from '../ast';
import join from '../util/join';
import unhandled from '../util/never';

export type BinaryOperator =
    | 'add'
    | 'subtract'
    | 'multiply'
    | 'divide'
    | 'modulo'
    | 'and'
    | 'or'
    | 'xor'
    | 'shiftLeft'
    | 'shiftRight';

export type SymbolReference =
    | { kind: 'global'; module: string; name: string }
    | { kind: 'string'; index: number };

export type CallTarget =
    | { kind: 'function'; symbol: FunctionSymbol }
    | { kind: 'runtime'; name: RuntimeFunctionName };

export type Statement = { why: string } & (
    // Arithmetic
    | { kind: 'loadImmediate'; value: number; destination: Register }
    | { kind: 'move'; from: Register; to: Register }
    | { kind: 'binaryOperation'; operator: BinaryOperator; lhs: Register; rhs: Register; destination: Register }
    | { kind: 'compare'; comparison: Comparison; lhs: Register; rhs: Register; destination: Register }
    // destination = source == 0, or source != 0 when negated
    | { kind: 'testZero'; source: Register; negated: boolean; destination: Register }
    | { kind: 'convert'; from: Register; to: Register }
    | { kind: 'increment'; register: Register }
    | { kind: 'decrement'; register: Register }
    // Labels and branches
    | { kind: 'label'; name: string }
    | { kind: 'goto'; label: string }
    | { kind: 'gotoIfFalse'; condition: Register; label: string }
    // Calls
    | { kind: 'call'; target: CallTarget; arguments: Register[]; destination: Register | null }
    | { kind: 'return'; register: Register | null }
    // Memory
    | { kind: 'addressOf'; symbol: SymbolReference; destination: Register }
    // destination = base + index * size of the pointed-to element
    | { kind: 'arrayIndex'; base: Register; index: Register; destination: Register }
    | { kind: 'load'; address: Register; destination: Register }
    | { kind: 'store'; address: Register; value: Register }
);

const operatorSymbol: { [O in BinaryOperator]: string } = {
    add: '+',
    subtract: '-',
    multiply: '*',
    divide: '/',
    modulo: '%',
    and: '&',
    or: '|',
    xor: '^',
    shiftLeft: '<<',
    shiftRight: '>>',
};

export const symbolReferenceToString = (symbol: SymbolReference): string =>
    symbol.kind == 'global' ? `${symbol.module}.${symbol.name}` : `str_${symbol.index}`;

export const callTargetToString = (target: CallTarget): string =>
    target.kind == 'function' ? symbolToString(target.symbol) : target.name;

const toStringWithoutComment = (tas: Statement): string => {
    switch (tas.kind) {
        case 'loadImmediate':
            return `${s(tas.destination)} = ${tas.value}`;
        case 'move':
            return `${s(tas.to)} = ${s(tas.from)}`;
        case 'binaryOperation':
            return `${s(tas.destination)} = ${s(tas.lhs)} ${operatorSymbol[tas.operator]} ${s(tas.rhs)}`;
        case 'compare':
            return `${s(tas.destination)} = ${s(tas.lhs)} ${tas.comparison} ${s(tas.rhs)}`;
        case 'testZero':
            return `${s(tas.destination)} = ${s(tas.source)} ${tas.negated ? '!=' : '=='} 0`;
        case 'convert':
            return `${s(tas.to)} = (convert) ${s(tas.from)}`;
        case 'increment':
            return `${s(tas.register)}++`;
        case 'decrement':
            return `${s(tas.register)}--`;
        case 'label':
            return `${tas.name}:`;
        case 'goto':
            return `goto ${tas.label}`;
        case 'gotoIfFalse':
            return `if (!${s(tas.condition)}) goto ${tas.label}`;
        case 'call': {
            const args = join(tas.arguments.map(s), ', ');
            const call = `${callTargetToString(tas.target)}(${args})`;
            return tas.destination ? `${s(tas.destination)} = ${call}` : call;
        }
        case 'return':
            return tas.register ? `return ${s(tas.register)}` : 'return';
        case 'addressOf':
            return `${s(tas.destination)} = &${symbolReferenceToString(tas.symbol)}`;
        case 'arrayIndex':
            return `${s(tas.destination)} = &${s(tas.base)}[${s(tas.index)}]`;
        case 'load':
            return `${s(tas.destination)} = *${s(tas.address)}`;
        case 'store':
            return `*${s(tas.address)} = ${s(tas.value)}`;
        default:
            return unhandled(tas, 'toStringWithoutComment');
    }
};

const preceedingWhitespace = (tas: Statement): string => (tas.kind == 'label' ? '' : '    ');

export const toString = (tas: Statement): string => {
    const why = tas.why.trim();
    return `${preceedingWhitespace(tas)}${toStringWithoutComment(tas)};${why ? ` ${why}` : ''}`;
};

export const reads = (tas: Statement): Register[] => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'label':
        case 'goto':
        case 'addressOf':
            return [];
        case 'move':
        case 'convert':
            return [tas.from];
        case 'binaryOperation':
        case 'compare':
            return [tas.lhs, tas.rhs];
        case 'testZero':
            return [tas.source];
        case 'increment':
        case 'decrement':
            return [tas.register];
        case 'gotoIfFalse':
            return [tas.condition];
        case 'call':
            return tas.arguments;
        case 'return':
            return tas.register ? [tas.register] : [];
        case 'arrayIndex':
            return [tas.base, tas.index];
        case 'load':
            return [tas.address];
        case 'store':
            return [tas.address, tas.value];
        default:
            return unhandled(tas, 'reads');
    }
};

export const writes = (tas: Statement): Register[] => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'binaryOperation':
        case 'compare':
        case 'testZero':
        case 'addressOf':
        case 'arrayIndex':
        case 'load':
            return [tas.destination];
        case 'move':
        case 'convert':
            return [tas.to];
        case 'increment':
        case 'decrement':
            return [tas.register];
        case 'call':
            return tas.destination ? [tas.destination] : [];
        case 'label':
        case 'goto':
        case 'gotoIfFalse':
        case 'return':
        case 'store':
            return [];
        default:
            return unhandled(tas, 'writes');
    }
};

// Rewrite the registers an instruction reads, leaving its writes alone.
export const mapReads = (tas: Statement, f: (r: Register) => Register): Statement => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'label':
        case 'goto':
        case 'addressOf':
            return tas;
        case 'move':
            return { ...tas, from: f(tas.from) };
        case 'convert':
            return { ...tas, from: f(tas.from) };
        case 'binaryOperation':
            return { ...tas, lhs: f(tas.lhs), rhs: f(tas.rhs) };
        case 'compare':
            return { ...tas, lhs: f(tas.lhs), rhs: f(tas.rhs) };
        case 'testZero':
            return { ...tas, source: f(tas.source) };
        case 'increment':
        case 'decrement':
            // These read and write the same register; renaming one renames both.
            return { ...tas, register: f(tas.register) };
        case 'gotoIfFalse':
            return { ...tas, condition: f(tas.condition) };
        case 'call':
            return { ...tas, arguments: tas.arguments.map(f) };
        case 'return':
            return { ...tas, register: tas.register ? f(tas.register) : null };
        case 'arrayIndex':
            return { ...tas, base: f(tas.base), index: f(tas.index) };
        case 'load':
            return { ...tas, address: f(tas.address) };
        case 'store':
            return { ...tas, address: f(tas.address), value: f(tas.value) };
        default:
            return unhandled(tas, 'mapReads');
    }
};

// Rewrite the register an instruction writes. Instructions without a plain destination are returned unchanged.
export const mapWrites = (tas: Statement, f: (r: Register) => Register): Statement => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'binaryOperation':
        case 'compare':
        case 'testZero':
        case 'addressOf':
        case 'arrayIndex':
        case 'load':
            return { ...tas, destination: f(tas.destination) };
        case 'move':
        case 'convert':
            return { ...tas, to: f(tas.to) };
        case 'call':
            return { ...tas, destination: tas.destination ? f(tas.destination) : null };
        case 'increment':
        case 'decrement':
        case 'label':
        case 'goto':
        case 'gotoIfFalse':
        case 'return':
        case 'store':
            return tas;
        default:
            return unhandled(tas, 'mapWrites');
    }
};

export const mapRegisters = (tas: Statement, f: (r: Register) => Register): Statement =>
    mapWrites(mapReads(tas, f), f);

export const jumpTarget = (tas: Statement): string | null =>
    tas.kind == 'goto' || tas.kind == 'gotoIfFalse' ? tas.label : null;
