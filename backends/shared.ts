import { Program } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { Statement } from '../threeAddressCode/Statement';
import { TargetDescriptor } from '../TargetDescriptor';
import { CompileError } from '../CompileError';
import { EmitOptions, EmitResult } from '../api';
import { Scalar, Integer, FixedPoint, Type, shortName, storageBits, valueBits, sizeInBytes } from '../types';
import join from '../util/join';
import debug from '../util/debug';
import unhandled from '../util/never';

// Output of the assembly emitters, before comments are attached.
export type Line =
    | { kind: 'label'; name: string }
    | { kind: 'instruction'; text: string; why: string }
    // Written as is, at column 0
    | { kind: 'raw'; text: string };

export const label = (name: string): Line => ({ kind: 'label', name });
export const raw = (text: string): Line => ({ kind: 'raw', text });
export const instruction = (text: string, why: string = ''): Line => ({ kind: 'instruction', text, why });

export const preceedingWhitespace = (line: Line): string => (line.kind == 'instruction' ? '    ' : '');

export const linesToString = (lines: Line[], { commentPrefix }: TargetDescriptor, { comments }: EmitOptions) =>
    join(
        lines.map(line => {
            switch (line.kind) {
                case 'label':
                    return `${line.name}:`;
                case 'raw':
                    return line.text;
                case 'instruction': {
                    const why = comments && line.why ? ` ${commentPrefix} ${line.why}` : '';
                    return `${preceedingWhitespace(line)}${line.text}${why}`;
                }
                default:
                    return unhandled(line, 'linesToString');
            }
        }),
        '\n'
    );

// Attach the IR statement's note to the first line generated for it.
export const withWhy = (lines: Line[], tas: Statement): Line[] => {
    const index = lines.findIndex(l => l.kind == 'instruction');
    if (index == -1) return lines;
    return lines.map((l, i) => (i == index && l.kind == 'instruction' && !l.why ? { ...l, why: tas.why } : l));
};

// Thrown by an emitter that can't express a function on its target.
export class EmitterFailure extends Error {}

// Emit each function on its own. A failure is recorded against that function and doesn't touch the others.
export const emitEach = (
    program: Program,
    target: TargetDescriptor,
    emitFunction: (f: Function) => string
): { functions: string[] } | { errors: CompileError[] } => {
    const functions: string[] = [];
    const errors: CompileError[] = [];
    program.functions.forEach(f => {
        try {
            functions.push(emitFunction(f));
        } catch (e) {
            if (!(e instanceof EmitterFailure)) throw e;
            errors.push({
                kind: 'emitterInternal',
                function: symbolToString(f.symbol),
                target: target.name,
                message: e.message,
            });
        }
    });
    return errors.length > 0 ? { errors } : { functions };
};

export const finish = (
    emitted: { functions: string[] } | { errors: CompileError[] },
    assemble: (functions: string[]) => string
): EmitResult => ('errors' in emitted ? emitted : { output: assemble(emitted.functions) });

// Little-endian bytes of a value in storage of the given width.
export const bytesOf = (value: number, bytes: number): number[] => {
    const modulus = 2 ** (bytes * 8);
    let remaining = ((Math.trunc(value) % modulus) + modulus) % modulus;
    const result: number[] = [];
    for (let i = 0; i < bytes; i++) {
        result.push(remaining % 256);
        remaining = Math.floor(remaining / 256);
    }
    return result;
};

export const storageBytes = (type: Scalar, pointerBits: number): number => storageBits(type, pointerBits) / 8;

// Name of the runtime helper for an operation on a type, such as __multiply_u16 or __compare_i24.
export const helperName = (operation: string, type: Scalar): string =>
    `__${operation}_${type.kind == 'Pointer' ? 'ptr' : shortName(type)}`;

export const conversionHelperName = (from: Scalar, to: Scalar): string =>
    `__convert_${from.kind == 'Pointer' ? 'ptr' : shortName(from)}_${to.kind == 'Pointer' ? 'ptr' : shortName(to)}`;

// Conversions that leave the stored bits alone, like u16 to i16.
export const isBitPreserving = (from: Scalar, to: Scalar, pointerBits: number): boolean => {
    if (from.kind == 'Pointer' && to.kind == 'Pointer') return true;
    if (from.kind != 'Integer' || to.kind != 'Integer') return false;
    return storageBits(from, pointerBits) == storageBits(to, pointerBits) && to.bits != 24;
};

// Value width is narrower than storage: the emitter must re-normalize after arithmetic.
export const isPartialWidth = (type: Integer | FixedPoint, pointerBits: number): boolean =>
    valueBits(type) != storageBits(type, pointerBits);

// Records the external symbols an emitted module needs from the runtime.
export class Externs {
    private readonly names = new Set<string>();

    use(name: string): string {
        this.names.add(name);
        return name;
    }

    get all(): string[] {
        return [...this.names].sort();
    }
}

// Labels must be unique across a whole assembly file.
export const qualifiedLabel = (f: Function, name: string): string => `${symbolToString(f.symbol)}_${name}`;

export const pointee = (type: Scalar): Type => {
    if (type.kind != 'Pointer') throw debug(`expected a pointer, got ${shortName(type)}`);
    return type.to;
};

export type DataDirectives = { byte: string; word: string; space: string };

// Data for a global on a little-endian 8 bit machine, as directive lines.
export const littleEndianData = (
    type: Type,
    initializer: number | number[] | undefined,
    pointerBits: number,
    { byte, word, space }: DataDirectives
): string[] => {
    const size = sizeInBytes(type, pointerBits);
    if (initializer === undefined) return [`${space} ${size}`];
    const element = type.kind == 'Array' ? type.of : type;
    const values = Array.isArray(initializer) ? [...initializer] : [initializer];
    if (type.kind == 'Array') {
        while (values.length < type.length) values.push(0);
    }
    const elementSize = sizeInBytes(element, pointerBits);
    if (elementSize == 1) return [`${byte} ${join(values.map(v => `${bytesOf(v, 1)[0]}`), ',')}`];
    const words: number[] = [];
    values.forEach(v => {
        const bytes = bytesOf(v, elementSize);
        for (let i = 0; i < bytes.length; i += 2) words.push(bytes[i] + 256 * (bytes[i + 1] || 0));
    });
    return [`${word} ${join(words.map(w => `${w}`), ',')}`];
};
