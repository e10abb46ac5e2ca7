import { Program, GlobalVariable, StringLiteral, globalName, stringLiteralName, findFunction } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { Register } from '../threeAddressCode/Register';
import { Statement, BinaryOperator, SymbolReference, CallTarget } from '../threeAddressCode/Statement';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { Comparison } from '../ast';
import { Backend, EmitOptions, EmitResult } from '../api';
import { targets } from '../TargetDescriptor';
import { Type, Scalar, valueBits, isSigned, fixedPointShift, sizeInBytes, one, toString as typeToString } from '../types';
import {
    Line,
    label,
    raw,
    instruction as ins,
    linesToString,
    withWhy,
    emitEach,
    finish,
    bytesOf,
    helperName,
    qualifiedLabel,
    pointee,
    Externs,
} from './shared';
import idAppender from '../util/idAppender';
import debug from '../util/debug';
import unhandled from '../util/never';
import join from '../util/join';

const descriptor = targets.m68k;

type Context = {
    f: Function;
    program: Program;
    // Every register has a long word on the frame, holding its value sign or zero extended to 32 bits.
    slots: Map<number, string>;
    externs: Externs;
    makeLabel: (name: string) => string;
};

const slot = (ctx: Context, r: Register): string => {
    const s = ctx.slots.get(r.id);
    if (!s) throw debug(`r${r.id} has no slot in ${symbolToString(ctx.f.symbol)}`);
    return s;
};

const frameLayout = (f: Function): { slots: Map<number, string>; frameSize: number } => {
    const slots = new Map<number, string>();
    const parameterIds = new Set(f.parameters.map(p => p.register.id));
    f.parameters.forEach((p, i) => slots.set(p.register.id, `${8 + 4 * i}(a6)`));
    let frameSize = 0;
    f.registers
        .filter(r => !parameterIds.has(r.id))
        .forEach(r => {
            frameSize += 4;
            slots.set(r.id, `-${frameSize}(a6)`);
        });
    return { slots, frameSize };
};

// Bring d0 back to the canonical 32 bit form of a value of this type.
const normalize = (type: Scalar): Line[] => {
    if (type.kind == 'Boolean' || type.kind == 'Pointer') return [];
    const bits = valueBits(type);
    if (bits === null || bits == 32) return [];
    if (!isSigned(type)) return [ins(`and.l #${2 ** bits - 1},d0`)];
    switch (bits) {
        case 8:
            return [ins('ext.w d0'), ins('ext.l d0')];
        case 16:
            return [ins('ext.l d0')];
        case 24:
            return [ins('lsl.l #8,d0'), ins('asr.l #8,d0')];
        default:
            throw debug(`no sign extension for ${bits} bits`);
    }
};

// Shift d0 by a constant; immediate counts only reach 8.
const shiftBy = (mnemonic: 'lsl.l' | 'asr.l', count: number): Line[] =>
    count <= 8 ? [ins(`${mnemonic} #${count},d0`)] : [ins(`moveq #${count},d2`), ins(`${mnemonic} d2,d0`)];

// Long-word library routines take both operands on the stack and return in d0.
const libraryCall = (ctx: Context, routine: string): Line[] => [
    ins('move.l d1,-(sp)'),
    ins('move.l d0,-(sp)'),
    ins(`jsr ${ctx.externs.use(routine)}`),
    ins('addq.l #8,sp'),
];

const simpleOperation: { [O in BinaryOperator]?: string } = {
    add: 'add.l',
    subtract: 'sub.l',
    and: 'and.l',
    or: 'or.l',
    xor: 'eor.l',
};

const operation = (ctx: Context, operator: BinaryOperator, type: Scalar): Line[] => {
    const bits = valueBits(type);
    if (bits === null) throw debug('arithmetic on a pointer');
    const mnemonic = simpleOperation[operator];
    if (mnemonic) return [ins(`${mnemonic} d1,d0`)];
    const signed = isSigned(type);
    switch (operator) {
        case 'multiply':
            if (type.kind == 'FixedPoint') {
                if (bits > 16) return libraryCall(ctx, helperName('multiply', type));
                return [ins('muls.w d1,d0'), ...shiftBy('asr.l', fixedPointShift(type))];
            }
            if (bits <= 16) return [ins(`${signed ? 'muls.w' : 'mulu.w'} d1,d0`)];
            return libraryCall(ctx, '__mulsi3');
        case 'divide':
            if (type.kind == 'FixedPoint') return libraryCall(ctx, helperName('divide', type));
            return libraryCall(ctx, signed ? '__divsi3' : '__udivsi3');
        case 'modulo':
            return libraryCall(ctx, signed ? '__modsi3' : '__umodsi3');
        case 'shiftLeft':
        case 'shiftRight': {
            // Counts outside 0..bits-1 are huge when compared unsigned.
            const outOfRange = qualifiedLabel(ctx.f, ctx.makeLabel('shift_out'));
            const done = qualifiedLabel(ctx.f, ctx.makeLabel('shift_done'));
            const inRange =
                operator == 'shiftLeft' ? 'lsl.l d1,d0' : signed ? 'asr.l d1,d0' : 'lsr.l d1,d0';
            const saturated =
                operator == 'shiftRight' && signed ? [ins('moveq #31,d1'), ins('asr.l d1,d0')] : [ins('moveq #0,d0')];
            return [
                ins(`cmp.l #${bits},d1`),
                ins(`bcc.s ${outOfRange}`),
                ins(inRange),
                ins(`bra.s ${done}`),
                label(outOfRange),
                ...saturated,
                label(done),
            ];
        }
        default:
            throw debug(`operator ${operator} should have been handled`);
    }
};

const conditionCode = (comparison: Comparison, signed: boolean): string => {
    switch (comparison) {
        case '==':
            return 'eq';
        case '!=':
            return 'ne';
        case '<':
            return signed ? 'lt' : 'cs';
        case '<=':
            return signed ? 'le' : 'ls';
        case '>':
            return signed ? 'gt' : 'hi';
        case '>=':
            return signed ? 'ge' : 'cc';
        default:
            return unhandled(comparison, 'conditionCode');
    }
};

const conversion = (from: Scalar, to: Scalar): Line[] => {
    if (to.kind == 'Boolean') return [ins('tst.l d0'), ins('sne d0'), ins('and.l #1,d0')];
    if (to.kind == 'Pointer' || from.kind == 'Pointer') return [];
    const fromShift = from.kind == 'FixedPoint' ? fixedPointShift(from) : 0;
    const toShift = to.kind == 'FixedPoint' ? fixedPointShift(to) : 0;
    const rescale =
        toShift > fromShift
            ? shiftBy('lsl.l', toShift - fromShift)
            : toShift < fromShift
            ? shiftBy('asr.l', fromShift - toShift)
            : [];
    return [...rescale, ...normalize(to)];
};

const sizeSuffix = (type: Scalar): 'b' | 'w' | 'l' => {
    const bytes = sizeInBytes(type, descriptor.pointerBits);
    switch (bytes) {
        case 1:
            return 'b';
        case 2:
            return 'w';
        case 4:
            return 'l';
        default:
            throw debug(`no move size for ${bytes} bytes`);
    }
};

const symbolLabel = (symbol: SymbolReference): string =>
    symbol.kind == 'global' ? globalName(symbol) : stringLiteralName(symbol);

const pushArguments = (ctx: Context, args: Register[]): Line[] =>
    [...args].reverse().map(a => ins(`move.l ${slot(ctx, a)},-(sp)`));

const callName = (ctx: Context, target: CallTarget): string => {
    if (target.kind == 'runtime') return ctx.externs.use(target.name);
    const callee = findFunction(ctx.program, target.symbol);
    if (!callee) throw debug(`call to missing function ${symbolToString(target.symbol)}`);
    return symbolToString(callee.symbol);
};

const dropArguments = (count: number): Line[] => (count == 0 ? [] : [ins(`add.l #${4 * count},sp`)]);

const statementTo68k = (ctx: Context, tas: Statement): Line[] => {
    switch (tas.kind) {
        case 'loadImmediate':
            return [ins(`move.l #${tas.value},${slot(ctx, tas.destination)}`)];
        case 'move':
            return [ins(`move.l ${slot(ctx, tas.from)},${slot(ctx, tas.to)}`)];
        case 'binaryOperation':
            return [
                ins(`move.l ${slot(ctx, tas.lhs)},d0`),
                ins(`move.l ${slot(ctx, tas.rhs)},d1`),
                ...operation(ctx, tas.operator, tas.destination.type),
                ...normalize(tas.destination.type),
                ins(`move.l d0,${slot(ctx, tas.destination)}`),
            ];
        case 'compare':
            return [
                ins(`move.l ${slot(ctx, tas.lhs)},d0`),
                ins(`cmp.l ${slot(ctx, tas.rhs)},d0`),
                ins(`s${conditionCode(tas.comparison, isSigned(tas.lhs.type))} d0`),
                ins('and.l #1,d0'),
                ins(`move.l d0,${slot(ctx, tas.destination)}`),
            ];
        case 'testZero':
            return [
                ins(`tst.l ${slot(ctx, tas.source)}`),
                ins(`${tas.negated ? 'sne' : 'seq'} d0`),
                ins('and.l #1,d0'),
                ins(`move.l d0,${slot(ctx, tas.destination)}`),
            ];
        case 'convert':
            return [
                ins(`move.l ${slot(ctx, tas.from)},d0`),
                ...conversion(tas.from.type, tas.to.type),
                ins(`move.l d0,${slot(ctx, tas.to)}`),
            ];
        case 'increment':
        case 'decrement': {
            const type = tas.register.type;
            if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${typeToString(type)}`);
            return [
                ins(`move.l ${slot(ctx, tas.register)},d0`),
                ins(`${tas.kind == 'increment' ? 'add.l' : 'sub.l'} #${one(type)},d0`),
                ...normalize(type),
                ins(`move.l d0,${slot(ctx, tas.register)}`),
            ];
        }
        case 'label':
            return [label(qualifiedLabel(ctx.f, tas.name))];
        case 'goto':
            return [ins(`bra ${qualifiedLabel(ctx.f, tas.label)}`)];
        case 'gotoIfFalse':
            return [ins(`tst.l ${slot(ctx, tas.condition)}`), ins(`beq ${qualifiedLabel(ctx.f, tas.label)}`)];
        case 'call':
            return [
                ...pushArguments(ctx, tas.arguments),
                ins(`jsr ${callName(ctx, tas.target)}`),
                ...dropArguments(tas.arguments.length),
                ...(tas.destination ? [ins(`move.l d0,${slot(ctx, tas.destination)}`)] : []),
            ];
        case 'return':
            return [
                ...(tas.register ? [ins(`move.l ${slot(ctx, tas.register)},d0`)] : []),
                ins('unlk a6'),
                ins('rts'),
            ];
        case 'addressOf':
            return [ins(`lea ${symbolLabel(tas.symbol)},a0`), ins(`move.l a0,${slot(ctx, tas.destination)}`)];
        case 'arrayIndex': {
            const size = sizeInBytes(pointee(tas.base.type), descriptor.pointerBits);
            const doublings = Math.log2(size);
            const scale = Number.isInteger(doublings)
                ? doublings == 0
                    ? []
                    : [ins(`lsl.l #${doublings},d0`)]
                : [ins(`mulu.w #${size},d0`)];
            return [
                ins(`move.l ${slot(ctx, tas.index)},d0`),
                ...scale,
                ins(`add.l ${slot(ctx, tas.base)},d0`),
                ins(`move.l d0,${slot(ctx, tas.destination)}`),
            ];
        }
        case 'load':
            return [
                ins(`movea.l ${slot(ctx, tas.address)},a0`),
                ins('moveq #0,d0'),
                ins(`move.${sizeSuffix(tas.destination.type)} (a0),d0`),
                ...normalize(tas.destination.type),
                ins(`move.l d0,${slot(ctx, tas.destination)}`),
            ];
        case 'store':
            return [
                ins(`movea.l ${slot(ctx, tas.address)},a0`),
                ins(`move.l ${slot(ctx, tas.value)},d0`),
                ins(`move.${sizeSuffix(tas.value.type)} d0,(a0)`),
            ];
        default:
            return unhandled(tas, 'statementTo68k');
    }
};

const functionTo68k = (f: Function, program: Program, externs: Externs, options: EmitOptions): string => {
    const sym = symbolToString(f.symbol);
    const { slots, frameSize } = frameLayout(f);
    const ctx: Context = { f, program, slots, externs, makeLabel: idAppender() };
    return linesToString(
        [
            raw(`    .globl ${sym}`),
            label(sym),
            ins(`link a6,#-${frameSize}`, 'Reserve a long word per local'),
            ...f.instructions.map(tas => withWhy(statementTo68k(ctx, tas), tas)).flat(),
        ],
        descriptor,
        options
    );
};

// Big-endian words, one directive per element.
const bigEndianData = (type: Type, initializer: number | number[] | undefined): string[] => {
    const size = sizeInBytes(type, descriptor.pointerBits);
    if (initializer === undefined) return [`.space ${size}`];
    const element = type.kind == 'Array' ? type.of : type;
    const values = Array.isArray(initializer) ? [...initializer] : [initializer];
    if (type.kind == 'Array') {
        while (values.length < type.length) values.push(0);
    }
    const elementSize = sizeInBytes(element, descriptor.pointerBits);
    const directive = elementSize == 1 ? '.byte' : elementSize == 2 ? '.word' : '.long';
    const unsigned = values.map(v => bytesOf(v, elementSize).reduceRight((acc, b) => acc * 256 + b, 0));
    return [`${directive} ${join(unsigned.map(v => `${v}`), ',')}`];
};

const globalTo68k = (g: GlobalVariable): Line[] => [
    ins('.even'),
    label(globalName(g)),
    ...bigEndianData(g.type, g.initializer).map(text => ins(text)),
];

const stringTo68k = (literal: StringLiteral): Line[] => {
    const name = stringLiteralName(literal);
    const bytes = Array.from(literal.value).map(c => `${c.charCodeAt(0) & 0xff}`);
    return [
        ins('.even'),
        label(name),
        ins(`.word ${literal.value.length}`),
        ins(`.long ${name}_data`),
        label(`${name}_data`),
        ...(bytes.length > 0 ? [ins(`.byte ${join(bytes, ',')}`)] : []),
    ];
};

const emit = (program: Program, options: EmitOptions): EmitResult => {
    const externs = new Externs();
    return finish(
        emitEach(program, descriptor, f => functionTo68k(f, program, externs, options)),
        functions => {
            const data = linesToString(
                [
                    raw('    .data'),
                    ...program.globals.map(globalTo68k).flat(),
                    ...program.stringLiterals.map(stringTo68k).flat(),
                ],
                descriptor,
                options
            );
            const header = [
                `${descriptor.commentPrefix} Module ${program.module}, generated for ${descriptor.description}`,
                ...externs.all.map(name => `    .extern ${name}`),
                '    .text',
            ];
            return `${join([join(header, '\n'), ...functions, data], '\n\n')}\n`;
        }
    );
};

const m68kBackend: Backend = {
    descriptor,
    emit,
    executors: [],
};
export default m68kBackend;
