import { Program, GlobalVariable, StringLiteral, globalName, stringLiteralName, findFunction } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { Register } from '../threeAddressCode/Register';
import { Statement, SymbolReference } from '../threeAddressCode/Statement';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { Comparison } from '../ast';
import { Backend, EmitOptions, EmitResult } from '../api';
import { targets } from '../TargetDescriptor';
import { Scalar, sizeInBytes, isSigned, one, toString as typeToString } from '../types';
import {
    Line,
    label,
    instruction as ins,
    linesToString,
    withWhy,
    emitEach,
    finish,
    bytesOf,
    storageBytes,
    helperName,
    conversionHelperName,
    isBitPreserving,
    isPartialWidth,
    littleEndianData,
    qualifiedLabel,
    pointee,
    Externs,
    EmitterFailure,
} from './shared';
import idAppender from '../util/idAppender';
import debug from '../util/debug';
import unhandled from '../util/never';
import join from '../util/join';

const descriptor = targets.mos6502;

// Zero page scratch the runtime reserves: helper operands, results and the pointer for indirect access.
const RET = '__ret';
const LHS = '__lhs';
const RHS = '__rhs';
const PTR = '__ptr';
const ARG = '__arg';

type Context = {
    f: Function;
    program: Program;
    // Offset of each register from the frame base, X after the prologue's TSX.
    offsets: Map<number, number>;
    externs: Externs;
    makeLabel: (name: string) => string;
};

const sizeOf = (r: Register): number => storageBytes(r.type, descriptor.pointerBits);

const hex = (n: number): string => `$${n.toString(16).toUpperCase().padStart(4, '0')}`;

// Stack page slots are addressed through X, which holds the stack pointer as it was after the prologue.
const slot = (ctx: Context, r: Register, i: number = 0): string => {
    const offset = ctx.offsets.get(r.id);
    if (offset === undefined) throw debug(`r${r.id} has no slot in ${symbolToString(ctx.f.symbol)}`);
    return `${hex(0x101 + offset + i)},X`;
};

const zp = (ctx: Context, name: string, i: number = 0): string => {
    ctx.externs.use(name);
    return i > 0 ? `${name}+${i}` : name;
};

const copyBytes = (from: (i: number) => string, to: (i: number) => string, count: number): Line[] =>
    Array.from({ length: count }, (_, i) => [ins(`LDA ${from(i)}`), ins(`STA ${to(i)}`)]).flat();

// Leaves A as $FF if bit 7 of the byte is set, 0 otherwise.
const signFill = (byte: string): Line[] => [ins(`LDA ${byte}`), ins('ASL A'), ins('LDA #0'), ins('ADC #$FF'), ins('EOR #$FF')];

// 24 bit values live in 4 bytes; the top byte must follow bit 23 after arithmetic.
const fixTopByte = (type: Scalar, byte: (i: number) => string): Line[] => {
    if (type.kind != 'Integer' && type.kind != 'FixedPoint') return [];
    if (!isPartialWidth(type, descriptor.pointerBits)) return [];
    return isSigned(type) ? [...signFill(byte(2)), ins(`STA ${byte(3)}`)] : [ins('LDA #0'), ins(`STA ${byte(3)}`)];
};

const frameLayout = (f: Function): { offsets: Map<number, number>; frameSize: number } => {
    const offsets = new Map<number, number>();
    const parameterIds = new Set(f.parameters.map(p => p.register.id));
    let frameSize = 0;
    f.registers
        .filter(r => !parameterIds.has(r.id))
        .forEach(r => {
            offsets.set(r.id, frameSize);
            frameSize += sizeOf(r);
        });
    // Above the locals: the return address, then the arguments as the caller pushed them.
    let argumentOffset = frameSize + 2;
    f.parameters.forEach(p => {
        offsets.set(p.register.id, argumentOffset);
        argumentOffset += sizeOf(p.register);
    });
    if (argumentOffset > 255) {
        throw new EmitterFailure(`frame of ${argumentOffset} bytes does not fit in the stack page`);
    }
    return { offsets, frameSize };
};

const adjustStack = (bytes: number, direction: 'reserve' | 'release'): Line[] =>
    bytes == 0
        ? [ins('TSX')]
        : [
              ins('TSX'),
              ins('TXA'),
              ins(direction == 'reserve' ? 'SEC' : 'CLC'),
              ins(direction == 'reserve' ? `SBC #${bytes}` : `ADC #${bytes}`),
              ins('TAX'),
              ins('TXS'),
          ];

const materialize = (ctx: Context, branch: string, destination: Register): Line[] => {
    const isTrue = qualifiedLabel(ctx.f, ctx.makeLabel('true'));
    const done = qualifiedLabel(ctx.f, ctx.makeLabel('done'));
    return [
        ins(`${branch} ${isTrue}`),
        ins('LDA #0'),
        ins(`BEQ ${done}`),
        label(isTrue),
        ins('LDA #1'),
        label(done),
        ins(`STA ${slot(ctx, destination)}`),
    ];
};

// Like CMP, the compare helpers leave Z set on equality and C set when lhs >= rhs in the type's order.
const branchFor = (comparison: Comparison): { branch: string; swap: boolean } => {
    switch (comparison) {
        case '==':
            return { branch: 'BEQ', swap: false };
        case '!=':
            return { branch: 'BNE', swap: false };
        case '<':
            return { branch: 'BCC', swap: false };
        case '>=':
            return { branch: 'BCS', swap: false };
        case '>':
            return { branch: 'BCC', swap: true };
        case '<=':
            return { branch: 'BCS', swap: true };
        default:
            return unhandled(comparison, 'branchFor');
    }
};

// Operand bytes go to __lhs and __rhs, the helper leaves its result in __ret.
const viaHelper = (ctx: Context, helper: string, lhs: Register, rhs: Register | null, destination: Register): Line[] => [
    ...copyBytes(i => slot(ctx, lhs, i), i => zp(ctx, LHS, i), sizeOf(lhs)),
    ...(rhs ? copyBytes(i => slot(ctx, rhs, i), i => zp(ctx, RHS, i), sizeOf(rhs)) : []),
    ins(`JSR ${ctx.externs.use(helper)}`),
    ins('TSX'),
    ...copyBytes(i => zp(ctx, RET, i), i => slot(ctx, destination, i), sizeOf(destination)),
];

const bytewise: { [op: string]: { setup: string | null; mnemonic: string } } = {
    add: { setup: 'CLC', mnemonic: 'ADC' },
    subtract: { setup: 'SEC', mnemonic: 'SBC' },
    and: { setup: null, mnemonic: 'AND' },
    or: { setup: null, mnemonic: 'ORA' },
    xor: { setup: null, mnemonic: 'EOR' },
};

const arithmetic = (ctx: Context, tas: Extract<Statement, { kind: 'binaryOperation' }>): Line[] => {
    const type = tas.destination.type;
    const inline = bytewise[tas.operator];
    if (!inline) return viaHelper(ctx, helperName(tas.operator, type), tas.lhs, tas.rhs, tas.destination);
    const body = Array.from({ length: sizeOf(tas.destination) }, (_, i) => [
        ins(`LDA ${slot(ctx, tas.lhs, i)}`),
        ins(`${inline.mnemonic} ${slot(ctx, tas.rhs, i)}`),
        ins(`STA ${slot(ctx, tas.destination, i)}`),
    ]).flat();
    return [
        ...(inline.setup ? [ins(inline.setup)] : []),
        ...body,
        ...fixTopByte(type, i => slot(ctx, tas.destination, i)),
    ];
};

const compare = (ctx: Context, tas: Extract<Statement, { kind: 'compare' }>): Line[] => {
    const { branch, swap } = branchFor(tas.comparison);
    const [lhs, rhs] = swap ? [tas.rhs, tas.lhs] : [tas.lhs, tas.rhs];
    if (sizeOf(lhs) == 1 && !isSigned(lhs.type)) {
        return [ins(`LDA ${slot(ctx, lhs)}`), ins(`CMP ${slot(ctx, rhs)}`), ...materialize(ctx, branch, tas.destination)];
    }
    const helper = ctx.externs.use(helperName('compare', lhs.type));
    return [
        ...copyBytes(i => slot(ctx, lhs, i), i => zp(ctx, LHS, i), sizeOf(lhs)),
        ...copyBytes(i => slot(ctx, rhs, i), i => zp(ctx, RHS, i), sizeOf(rhs)),
        ins(`JSR ${helper}`),
        // TSX would disturb the flags; the helper leaves X alone.
        ...materialize(ctx, branch, tas.destination),
    ];
};

const testZero = (ctx: Context, tas: Extract<Statement, { kind: 'testZero' }>): Line[] => [
    ins(`LDA ${slot(ctx, tas.source)}`),
    ...Array.from({ length: sizeOf(tas.source) - 1 }, (_, i) => ins(`ORA ${slot(ctx, tas.source, i + 1)}`)),
    ...materialize(ctx, tas.negated ? 'BNE' : 'BEQ', tas.destination),
];

const step = (ctx: Context, tas: Extract<Statement, { kind: 'increment' | 'decrement' }>): Line[] => {
    const type = tas.register.type;
    if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${typeToString(type)}`);
    const size = sizeOf(tas.register);
    const amount = bytesOf(one(type), size);
    // Bytes below the first non-zero one are untouched and produce no carry.
    const first = amount.findIndex(b => b != 0);
    if (first == -1) return [];
    const up = tas.kind == 'increment';
    const chain: Line[] = [ins(up ? 'CLC' : 'SEC')];
    for (let i = first; i < size; i++) {
        chain.push(
            ins(`LDA ${slot(ctx, tas.register, i)}`),
            ins(`${up ? 'ADC' : 'SBC'} #${amount[i]}`),
            ins(`STA ${slot(ctx, tas.register, i)}`)
        );
    }
    return [...chain, ...fixTopByte(type, i => slot(ctx, tas.register, i))];
};

const symbolLabel = (symbol: SymbolReference): string =>
    symbol.kind == 'global' ? globalName(symbol) : stringLiteralName(symbol);

const callFunction = (ctx: Context, tas: Extract<Statement, { kind: 'call' }>): Line[] => {
    const destination = tas.destination;
    const result = destination ? copyBytes(i => zp(ctx, RET, i), i => slot(ctx, destination, i), sizeOf(destination)) : [];
    if (tas.target.kind == 'runtime') {
        const args = tas.arguments.map(a => copyBytes(i => slot(ctx, a, i), i => zp(ctx, ARG, i), sizeOf(a))).flat();
        return [...args, ins(`JSR ${ctx.externs.use(tas.target.name)}`), ins('TSX')];
    }
    const callee = findFunction(ctx.program, tas.target.symbol);
    if (!callee) throw debug(`call to missing function ${symbolToString(tas.target.symbol)}`);
    let pushedBytes = 0;
    // Last argument first, high byte first, so each argument ends up little-endian in the callee's frame.
    const pushes = [...tas.arguments]
        .reverse()
        .map(arg => {
            const size = sizeOf(arg);
            pushedBytes += size;
            return Array.from({ length: size }, (_, i) => [ins(`LDA ${slot(ctx, arg, size - 1 - i)}`), ins('PHA')]).flat();
        })
        .flat();
    return [...pushes, ins(`JSR ${symbolToString(callee.symbol)}`), ...adjustStack(pushedBytes, 'release'), ...result];
};

const statementTo6502 = (ctx: Context, tas: Statement, epilogue: string): Line[] => {
    switch (tas.kind) {
        case 'loadImmediate':
            return bytesOf(tas.value, sizeOf(tas.destination))
                .map((b, i) => [ins(`LDA #${b}`), ins(`STA ${slot(ctx, tas.destination, i)}`)])
                .flat();
        case 'move':
            return copyBytes(i => slot(ctx, tas.from, i), i => slot(ctx, tas.to, i), sizeOf(tas.to));
        case 'binaryOperation':
            return arithmetic(ctx, tas);
        case 'compare':
            return compare(ctx, tas);
        case 'testZero':
            return testZero(ctx, tas);
        case 'convert':
            if (isBitPreserving(tas.from.type, tas.to.type, descriptor.pointerBits)) {
                return copyBytes(i => slot(ctx, tas.from, i), i => slot(ctx, tas.to, i), sizeOf(tas.to));
            }
            return viaHelper(ctx, conversionHelperName(tas.from.type, tas.to.type), tas.from, null, tas.to);
        case 'increment':
        case 'decrement':
            return step(ctx, tas);
        case 'label':
            return [label(qualifiedLabel(ctx.f, tas.name))];
        case 'goto':
            return [ins(`JMP ${qualifiedLabel(ctx.f, tas.label)}`)];
        case 'gotoIfFalse': {
            // Branches only reach 127 bytes, so jump over a JMP instead.
            const skip = qualifiedLabel(ctx.f, ctx.makeLabel('skip'));
            return [
                ins(`LDA ${slot(ctx, tas.condition)}`),
                ins(`BNE ${skip}`),
                ins(`JMP ${qualifiedLabel(ctx.f, tas.label)}`),
                label(skip),
            ];
        }
        case 'call':
            return callFunction(ctx, tas);
        case 'return': {
            const register = tas.register;
            const value = register ? copyBytes(i => slot(ctx, register, i), i => zp(ctx, RET, i), sizeOf(register)) : [];
            return [...value, ins(`JMP ${epilogue}`)];
        }
        case 'addressOf': {
            const name = symbolLabel(tas.symbol);
            return [
                ins(`LDA #<${name}`),
                ins(`STA ${slot(ctx, tas.destination, 0)}`),
                ins(`LDA #>${name}`),
                ins(`STA ${slot(ctx, tas.destination, 1)}`),
            ];
        }
        case 'arrayIndex': {
            const size = sizeInBytes(pointee(tas.base.type), descriptor.pointerBits);
            const index = tas.index;
            const indexBytes = sizeOf(index);
            // Byte offset into __ret, as 16 bits.
            const widen =
                indexBytes == 1
                    ? [
                          ...(isSigned(index.type) ? signFill(slot(ctx, index)) : [ins('LDA #0')]),
                          ins(`STA ${zp(ctx, RET, 1)}`),
                          ins(`LDA ${slot(ctx, index)}`),
                          ins(`STA ${zp(ctx, RET)}`),
                      ]
                    : copyBytes(i => slot(ctx, index, i), i => zp(ctx, RET, i), 2);
            const scale =
                size == 1
                    ? []
                    : [
                          ...copyBytes(i => zp(ctx, RET, i), i => zp(ctx, LHS, i), 2),
                          ...bytesOf(size, 2).map((b, i) => [ins(`LDA #${b}`), ins(`STA ${zp(ctx, RHS, i)}`)]).flat(),
                          ins(`JSR ${ctx.externs.use('__multiply_u16')}`),
                          ins('TSX'),
                      ];
            return [
                ...widen,
                ...scale,
                ins('CLC'),
                ...[0, 1]
                    .map(i => [
                        ins(`LDA ${zp(ctx, RET, i)}`),
                        ins(`ADC ${slot(ctx, tas.base, i)}`),
                        ins(`STA ${slot(ctx, tas.destination, i)}`),
                    ])
                    .flat(),
            ];
        }
        case 'load':
            return [
                ...copyBytes(i => slot(ctx, tas.address, i), i => zp(ctx, PTR, i), 2),
                ...Array.from({ length: sizeOf(tas.destination) }, (_, i) => [
                    ins(`LDY #${i}`),
                    ins(`LDA (${zp(ctx, PTR)}),Y`),
                    ins(`STA ${slot(ctx, tas.destination, i)}`),
                ]).flat(),
            ];
        case 'store':
            return [
                ...copyBytes(i => slot(ctx, tas.address, i), i => zp(ctx, PTR, i), 2),
                ...Array.from({ length: sizeOf(tas.value) }, (_, i) => [
                    ins(`LDY #${i}`),
                    ins(`LDA ${slot(ctx, tas.value, i)}`),
                    ins(`STA (${zp(ctx, PTR)}),Y`),
                ]).flat(),
            ];
        default:
            return unhandled(tas, 'statementTo6502');
    }
};

const functionTo6502 = (f: Function, program: Program, externs: Externs, options: EmitOptions): string => {
    const sym = symbolToString(f.symbol);
    const { offsets, frameSize } = frameLayout(f);
    const ctx: Context = { f, program, offsets, externs, makeLabel: idAppender() };
    const epilogue = `${sym}_epilogue`;
    const lines: Line[] = [
        label(sym),
        ...adjustStack(frameSize, 'reserve'),
        ...f.instructions.map(tas => withWhy(statementTo6502(ctx, tas, epilogue), tas)).flat(),
        label(epilogue),
        ...adjustStack(frameSize, 'release'),
        ins('RTS'),
    ];
    return linesToString(lines, descriptor, options);
};

const dataDirectives = { byte: '.byte', word: '.word', space: '.res' };

const globalTo6502 = (g: GlobalVariable): Line[] => [
    label(globalName(g)),
    ...littleEndianData(g.type, g.initializer, descriptor.pointerBits, dataDirectives).map(text => ins(text)),
];

const stringTo6502 = (literal: StringLiteral): Line[] => {
    const name = stringLiteralName(literal);
    const bytes = Array.from(literal.value).map(c => `${c.charCodeAt(0) & 0xff}`);
    return [
        label(name),
        ins(`.word ${literal.value.length},${name}_data`),
        label(`${name}_data`),
        ...(bytes.length > 0 ? [ins(`.byte ${join(bytes, ',')}`)] : []),
    ];
};

const emit = (program: Program, options: EmitOptions): EmitResult => {
    const externs = new Externs();
    return finish(
        emitEach(program, descriptor, f => functionTo6502(f, program, externs, options)),
        functions => {
            const data = linesToString(
                [...program.globals.map(globalTo6502).flat(), ...program.stringLiterals.map(stringTo6502).flat()],
                descriptor,
                options
            );
            const header = [
                `${descriptor.commentPrefix} Module ${program.module}, generated for ${descriptor.description}`,
                // Instance symbols are mangled with $
                '    .feature dollar_in_identifiers',
                ...externs.all.map(name => `    .import ${name}`),
                ...program.functions.map(f => `    .export ${symbolToString(f.symbol)}`),
            ];
            return `${join([join(header, '\n'), ...functions, data], '\n\n')}\n`;
        }
    );
};

const mos6502Backend: Backend = {
    descriptor,
    emit,
    executors: [],
};
export default mos6502Backend;
