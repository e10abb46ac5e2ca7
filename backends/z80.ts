import { Program, GlobalVariable, StringLiteral, globalName, stringLiteralName, findFunction } from '../threeAddressCode/Program';
import { Function, Parameter } from '../threeAddressCode/Function';
import { Register } from '../threeAddressCode/Register';
import { Statement, SymbolReference } from '../threeAddressCode/Statement';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { Comparison } from '../ast';
import { Backend, EmitOptions, EmitResult } from '../api';
import { targets } from '../TargetDescriptor';
import { Scalar, storageBits, sizeInBytes, isSigned, one, toString as typeToString } from '../types';
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
    conversionHelperName,
    isBitPreserving,
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

const descriptor = targets['z80-smc'];

// Where a register lives: an IX-relative frame slot, or static storage for SMC functions.
type Home = { kind: 'frame'; offset: number } | { kind: 'static'; label: string };

type Size = 1 | 2 | 4;

// Scratch areas the runtime provides for 32 bit operations.
const ACC = '__acc32';
const ARG = '__arg32';

type Context = {
    f: Function;
    program: Program;
    homes: Map<number, Home>;
    externs: Externs;
    makeLabel: (name: string) => string;
};

const sizeOf = (type: Scalar): Size => {
    const bits = storageBits(type, descriptor.pointerBits);
    switch (bits) {
        case 8:
            return 1;
        case 16:
            return 2;
        case 32:
            return 4;
        default:
            throw debug(`no Z80 storage for ${bits} bit values`);
    }
};

const displacement = (n: number): string => (n >= 0 ? `+${n}` : `${n}`);

const byteAt = (home: Home, i: number): string =>
    home.kind == 'frame' ? `(IX${displacement(home.offset + i)})` : `(${home.label}${i > 0 ? `+${i}` : ''})`;

const loadA = (home: Home): Line[] => [ins(`LD A,${byteAt(home, 0)}`)];
const storeA = (home: Home): Line[] => [ins(`LD ${byteAt(home, 0)},A`)];

// Frame words go through DE: there are no LD HL,(IX+d) or LD (IX+d),HL forms.
const loadHL = (home: Home, at: number = 0): Line[] =>
    home.kind == 'frame'
        ? [ins(`LD E,${byteAt(home, at)}`), ins(`LD D,${byteAt(home, at + 1)}`), ins('EX DE,HL')]
        : [ins(`LD HL,${byteAt(home, at)}`)];

const loadDE = (home: Home): Line[] =>
    home.kind == 'frame'
        ? [ins(`LD E,${byteAt(home, 0)}`), ins(`LD D,${byteAt(home, 1)}`)]
        : [ins(`LD DE,${byteAt(home, 0)}`)];

const storeHL = (home: Home, at: number = 0): Line[] =>
    home.kind == 'frame'
        ? [ins('EX DE,HL'), ins(`LD ${byteAt(home, at)},E`), ins(`LD ${byteAt(home, at + 1)},D`)]
        : [ins(`LD ${byteAt(home, at)},HL`)];

const copy4 = (from: Home, to: Home): Line[] =>
    [0, 1, 2, 3].map(i => [ins(`LD A,${byteAt(from, i)}`), ins(`LD ${byteAt(to, i)},A`)]).flat();

const scratch = (ctx: Context, name: string): Home => ({ kind: 'static', label: ctx.externs.use(name) });

const homeOf = (ctx: Context, r: Register): Home => {
    const home = ctx.homes.get(r.id);
    if (!home) throw debug(`r${r.id} has no home in ${symbolToString(ctx.f.symbol)}`);
    return home;
};

// Bring a register into A, HL or __acc32 according to its size.
const loadValue = (ctx: Context, r: Register): Line[] => {
    const home = homeOf(ctx, r);
    switch (sizeOf(r.type)) {
        case 1:
            return loadA(home);
        case 2:
            return loadHL(home);
        case 4:
            return copy4(home, scratch(ctx, ACC));
    }
};

const storeValue = (ctx: Context, r: Register): Line[] => {
    const home = homeOf(ctx, r);
    switch (sizeOf(r.type)) {
        case 1:
            return storeA(home);
        case 2:
            return storeHL(home);
        case 4:
            return copy4(scratch(ctx, ACC), home);
    }
};

const call = (ctx: Context, name: string): Line => ins(`CALL ${ctx.externs.use(name)}`);

const loadImmediate = (value: number, size: Size, home: Home): Line[] => {
    const bytes = bytesOf(value, size);
    if (size == 1) return [ins(`LD A,${bytes[0]}`), ...storeA(home)];
    const words = [bytes[0] + 256 * bytes[1]];
    if (size == 4) words.push(bytes[2] + 256 * bytes[3]);
    return words.map((w, i) => [ins(`LD HL,${w}`), ...storeHL(home, 2 * i)]).flat();
};

// Leave 1 in A if the condition flag is set, 0 otherwise.
const materialize = (ctx: Context, condition: 'Z' | 'NZ' | 'C' | 'NC', destination: Register): Line[] => {
    const done = qualifiedLabel(ctx.f, ctx.makeLabel('cmp'));
    return [ins('LD A,1'), ins(`JR ${condition},${done}`), ins('XOR A'), label(done), ...storeA(homeOf(ctx, destination))];
};

// Rewrite > and <= by swapping operands, leaving only comparisons with a single flag test.
const normalizeComparison = (
    comparison: Comparison,
    lhs: Register,
    rhs: Register
): { flag: 'Z' | 'NZ' | 'C' | 'NC'; lhs: Register; rhs: Register; ordered: boolean } => {
    switch (comparison) {
        case '==':
            return { flag: 'Z', lhs, rhs, ordered: false };
        case '!=':
            return { flag: 'NZ', lhs, rhs, ordered: false };
        case '<':
            return { flag: 'C', lhs, rhs, ordered: true };
        case '>=':
            return { flag: 'NC', lhs, rhs, ordered: true };
        case '>':
            return { flag: 'C', lhs: rhs, rhs: lhs, ordered: true };
        case '<=':
            return { flag: 'NC', lhs: rhs, rhs: lhs, ordered: true };
        default:
            return unhandled(comparison, 'normalizeComparison');
    }
};

const byteOperation: { [op: string]: string } = { add: 'ADD A,B', subtract: 'SUB B', and: 'AND B', or: 'OR B', xor: 'XOR B' };
const bitwiseMnemonic: { [op: string]: string } = { and: 'AND', or: 'OR', xor: 'XOR' };

const symbolLabel = (symbol: SymbolReference): string =>
    symbol.kind == 'global' ? globalName(symbol) : stringLiteralName(symbol);

export type SmcSlot = { parameter: string; label: string; offset: number; bytes: 1 | 2 };

const slotBase = (f: Function, p: Parameter): string => `${symbolToString(f.symbol)}_${p.name}`;
export const slotLabel = (f: Function, p: Parameter): string => `${slotBase(f, p)}_imm`;

// Immediate operand of each parameter's load, as an offset from the function's entry point.
export const smcSlots = (f: Function): SmcSlot[] => {
    let position = 0;
    return f.parameters.map(p => {
        const size = sizeOf(p.register.type);
        if (size == 4) {
            throw new EmitterFailure(
                `parameter ${p.name} is ${typeToString(p.register.type)}; SMC slots hold at most 16 bits`
            );
        }
        const slot: SmcSlot = { parameter: p.name, label: slotLabel(f, p), offset: position + 1, bytes: size };
        // LD A,n + LD (nn),A is 5 bytes; LD HL,nn + LD (nn),HL is 6
        position += size == 1 ? 5 : 6;
        return slot;
    });
};

const staticHomes = (f: Function): Map<number, Home> => {
    const sym = symbolToString(f.symbol);
    return new Map(f.registers.map((r): [number, Home] => [r.id, { kind: 'static', label: `${sym}_r${r.id}` }]));
};

const frameHomes = (f: Function): { homes: Map<number, Home>; frameSize: number } => {
    const homes = new Map<number, Home>();
    const parameterIds = new Set(f.parameters.map(p => p.register.id));
    // Saved IX, then the return address, then the caller's pushed arguments.
    let argumentOffset = 4;
    f.parameters.forEach(p => {
        homes.set(p.register.id, { kind: 'frame', offset: argumentOffset });
        argumentOffset += sizeOf(p.register.type) == 4 ? 4 : 2;
    });
    let frameSize = 0;
    f.registers
        .filter(r => !parameterIds.has(r.id))
        .forEach(r => {
            frameSize += sizeOf(r.type);
            homes.set(r.id, { kind: 'frame', offset: -frameSize });
        });
    if (frameSize > 128 || argumentOffset - 1 > 127) {
        throw new EmitterFailure(
            `frame of ${frameSize} bytes and ${argumentOffset - 4} bytes of arguments exceeds the IX displacement range`
        );
    }
    return { homes, frameSize };
};

const callFunction = (ctx: Context, tas: Extract<Statement, { kind: 'call' }>): Line[] => {
    if (tas.target.kind == 'runtime') {
        const args = tas.arguments.map(a => loadValue(ctx, a)).flat();
        return [...args, call(ctx, tas.target.name)];
    }
    const callee = findFunction(ctx.program, tas.target.symbol);
    if (!callee) throw debug(`call to missing function ${symbolToString(tas.target.symbol)}`);
    const name = symbolToString(callee.symbol);
    const result = tas.destination ? storeValue(ctx, tas.destination) : [];
    if (callee.convention == 'smc') {
        const patches = callee.parameters
            .map((p, i) => {
                const arg = tas.arguments[i];
                const home = homeOf(ctx, arg);
                switch (sizeOf(arg.type)) {
                    case 1:
                        return [...loadA(home), ins(`LD (${slotLabel(callee, p)}),A`, `Patch ${p.name}`)];
                    case 2:
                        return [...loadHL(home), ins(`LD (${slotLabel(callee, p)}),HL`, `Patch ${p.name}`)];
                    case 4:
                        throw new EmitterFailure(`can't patch ${p.name} of ${name}: SMC slots hold at most 16 bits`);
                }
            })
            .flat();
        return [...patches, ins(`CALL ${name}`), ...result];
    }
    let pushedBytes = 0;
    const pushes = [...tas.arguments]
        .reverse()
        .map(arg => {
            const home = homeOf(ctx, arg);
            switch (sizeOf(arg.type)) {
                case 1:
                    pushedBytes += 2;
                    return [...loadA(home), ins('LD L,A'), ins('PUSH HL')];
                case 2:
                    pushedBytes += 2;
                    return [...loadHL(home), ins('PUSH HL')];
                case 4:
                    pushedBytes += 4;
                    return [...loadHL(home, 2), ins('PUSH HL'), ...loadHL(home, 0), ins('PUSH HL')];
            }
        })
        .flat();
    const pops: Line[] = [];
    for (let i = 0; i < pushedBytes; i += 2) pops.push(ins('POP BC', i == 0 ? 'Drop arguments' : ''));
    return [...pushes, ins(`CALL ${name}`), ...pops, ...result];
};

const arithmetic = (ctx: Context, tas: Extract<Statement, { kind: 'binaryOperation' }>): Line[] => {
    const type = tas.destination.type;
    const [lhs, rhs, destination] = [tas.lhs, tas.rhs, tas.destination].map(r => homeOf(ctx, r));
    switch (sizeOf(type)) {
        case 1: {
            const operands = [...loadA(rhs), ins('LD B,A'), ...loadA(lhs)];
            const inline = byteOperation[tas.operator];
            return [
                ...operands,
                inline ? ins(inline) : call(ctx, helperName(tas.operator, type)),
                ...storeA(destination),
            ];
        }
        case 2: {
            const operands = [...loadHL(lhs), ...loadDE(rhs)];
            const operation = (): Line[] => {
                switch (tas.operator) {
                    case 'add':
                        return [ins('ADD HL,DE')];
                    case 'subtract':
                        return [ins('OR A'), ins('SBC HL,DE')];
                    case 'and':
                    case 'or':
                    case 'xor': {
                        const mnemonic = bitwiseMnemonic[tas.operator];
                        return [
                            ['L', 'E'],
                            ['H', 'D'],
                        ]
                            .map(([half, other]) => [ins(`LD A,${half}`), ins(`${mnemonic} ${other}`), ins(`LD ${half},A`)])
                            .flat();
                    }
                    default:
                        return [call(ctx, helperName(tas.operator, type))];
                }
            };
            return [...operands, ...operation(), ...storeHL(destination)];
        }
        case 4:
            return [
                ...copy4(lhs, scratch(ctx, ACC)),
                ...copy4(rhs, scratch(ctx, ARG)),
                call(ctx, helperName(tas.operator, type)),
                ...copy4(scratch(ctx, ACC), destination),
            ];
    }
};

const compare = (ctx: Context, tas: Extract<Statement, { kind: 'compare' }>): Line[] => {
    const { flag, lhs, rhs, ordered } = normalizeComparison(tas.comparison, tas.lhs, tas.rhs);
    const type = lhs.type;
    // Offsetting both operands by half the range turns a signed order into an unsigned one.
    const bias = ordered && isSigned(type);
    const setFlags = (): Line[] => {
        switch (sizeOf(type)) {
            case 1:
                return [
                    ...loadA(homeOf(ctx, rhs)),
                    ...(bias ? [ins('XOR 80H')] : []),
                    ins('LD B,A'),
                    ...loadA(homeOf(ctx, lhs)),
                    ...(bias ? [ins('XOR 80H')] : []),
                    ins('CP B'),
                ];
            case 2:
                return [
                    ...loadHL(homeOf(ctx, lhs)),
                    ...loadDE(homeOf(ctx, rhs)),
                    ...(bias
                        ? [ins('LD A,H'), ins('XOR 80H'), ins('LD H,A'), ins('LD A,D'), ins('XOR 80H'), ins('LD D,A')]
                        : []),
                    ins('OR A'),
                    ins('SBC HL,DE'),
                ];
            case 4:
                return [
                    ...copy4(homeOf(ctx, lhs), scratch(ctx, ACC)),
                    ...copy4(homeOf(ctx, rhs), scratch(ctx, ARG)),
                    call(ctx, helperName('compare', type)),
                ];
        }
    };
    return [...setFlags(), ...materialize(ctx, flag, tas.destination)];
};

const testZero = (ctx: Context, tas: Extract<Statement, { kind: 'testZero' }>): Line[] => {
    const source = homeOf(ctx, tas.source);
    const setFlags = (): Line[] => {
        switch (sizeOf(tas.source.type)) {
            case 1:
                return [...loadA(source), ins('OR A')];
            case 2:
                return [...loadHL(source), ins('LD A,H'), ins('OR L')];
            case 4:
                return [
                    ins(`LD A,${byteAt(source, 0)}`),
                    ...[1, 2, 3].map(i => [ins('LD B,A'), ins(`LD A,${byteAt(source, i)}`), ins('OR B')]).flat(),
                ];
        }
    };
    return [...setFlags(), ...materialize(ctx, tas.negated ? 'NZ' : 'Z', tas.destination)];
};

const step = (ctx: Context, tas: Extract<Statement, { kind: 'increment' | 'decrement' }>): Line[] => {
    const type = tas.register.type;
    if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${typeToString(type)}`);
    const home = homeOf(ctx, tas.register);
    const up = tas.kind == 'increment';
    const amount = one(type);
    switch (sizeOf(type)) {
        case 1:
            // 1.0 doesn't fit in an f.8, so stepping it changes nothing
            return amount == 1 ? [...loadA(home), ins(up ? 'INC A' : 'DEC A'), ...storeA(home)] : [];
        case 2:
            if (amount == 1) return [...loadHL(home), ins(up ? 'INC HL' : 'DEC HL'), ...storeHL(home)];
            if (amount == 256) return [...loadHL(home), ins(up ? 'INC H' : 'DEC H'), ...storeHL(home)];
            return [];
        case 4:
            return [
                ...copy4(home, scratch(ctx, ACC)),
                ...loadImmediate(amount, 4, scratch(ctx, ARG)),
                call(ctx, helperName(up ? 'add' : 'subtract', type)),
                ...copy4(scratch(ctx, ACC), home),
            ];
    }
};

const statementToZ80 = (ctx: Context, tas: Statement, epilogue: string | null): Line[] => {
    const home = (r: Register) => homeOf(ctx, r);
    switch (tas.kind) {
        case 'loadImmediate':
            return loadImmediate(tas.value, sizeOf(tas.destination.type), home(tas.destination));
        case 'move':
            return [...loadValue(ctx, tas.from), ...storeValue(ctx, tas.to)];
        case 'binaryOperation':
            return arithmetic(ctx, tas);
        case 'compare':
            return compare(ctx, tas);
        case 'testZero':
            return testZero(ctx, tas);
        case 'convert':
            if (isBitPreserving(tas.from.type, tas.to.type, descriptor.pointerBits)) {
                return [...loadValue(ctx, tas.from), ...storeValue(ctx, tas.to)];
            }
            return [
                ...loadValue(ctx, tas.from),
                call(ctx, conversionHelperName(tas.from.type, tas.to.type)),
                ...storeValue(ctx, tas.to),
            ];
        case 'increment':
        case 'decrement':
            return step(ctx, tas);
        case 'label':
            return [label(qualifiedLabel(ctx.f, tas.name))];
        case 'goto':
            return [ins(`JP ${qualifiedLabel(ctx.f, tas.label)}`)];
        case 'gotoIfFalse':
            return [...loadA(home(tas.condition)), ins('OR A'), ins(`JP Z,${qualifiedLabel(ctx.f, tas.label)}`)];
        case 'call':
            return callFunction(ctx, tas);
        case 'return': {
            const value = tas.register ? loadValue(ctx, tas.register) : [];
            return [...value, epilogue ? ins(`JP ${epilogue}`) : ins('RET')];
        }
        case 'addressOf':
            return [ins(`LD HL,${symbolLabel(tas.symbol)}`), ...storeHL(home(tas.destination))];
        case 'arrayIndex': {
            const size = sizeInBytes(pointee(tas.base.type), descriptor.pointerBits);
            const index = home(tas.index);
            const loadIndex =
                sizeOf(tas.index.type) == 1 ? [...loadA(index), ins('LD L,A'), ins('LD H,0')] : loadHL(index);
            const doublings = Math.log2(size);
            const scale = Number.isInteger(doublings)
                ? Array.from({ length: doublings }, () => ins('ADD HL,HL'))
                : [ins(`LD DE,${size}`), call(ctx, '__multiply_u16')];
            return [
                ...loadIndex,
                ...scale,
                ins('PUSH HL'),
                ...loadHL(home(tas.base)),
                ins('POP DE'),
                ins('ADD HL,DE'),
                ...storeHL(home(tas.destination)),
            ];
        }
        case 'load': {
            const destination = home(tas.destination);
            const address = loadHL(home(tas.address));
            switch (sizeOf(tas.destination.type)) {
                case 1:
                    return [...address, ins('LD A,(HL)'), ...storeA(destination)];
                case 2:
                    return [...address, ins('LD E,(HL)'), ins('INC HL'), ins('LD D,(HL)'), ins('EX DE,HL'), ...storeHL(destination)];
                case 4:
                    return [
                        ...address,
                        ins(`LD DE,${ctx.externs.use(ACC)}`),
                        ins('LD BC,4'),
                        ins('LDIR'),
                        ...copy4(scratch(ctx, ACC), destination),
                    ];
            }
        }
        case 'store': {
            const value = home(tas.value);
            const address = home(tas.address);
            switch (sizeOf(tas.value.type)) {
                case 1:
                    return [...loadHL(address), ...loadA(value), ins('LD (HL),A')];
                case 2:
                    return [
                        ...loadHL(value),
                        ins('PUSH HL'),
                        ...loadHL(address),
                        ins('POP DE'),
                        ins('LD (HL),E'),
                        ins('INC HL'),
                        ins('LD (HL),D'),
                    ];
                case 4:
                    return [
                        ...copy4(value, scratch(ctx, ACC)),
                        ...loadHL(address),
                        ins('EX DE,HL'),
                        ins(`LD HL,${ACC}`),
                        ins('LD BC,4'),
                        ins('LDIR'),
                    ];
            }
        }
        default:
            return unhandled(tas, 'statementToZ80');
    }
};

const smcPrologue = (f: Function, homes: Map<number, Home>): Line[] => {
    const slots = smcSlots(f);
    return f.parameters
        .map((p, i) => {
            const base = slotBase(f, p);
            const home = homes.get(p.register.id);
            if (!home) throw debug(`parameter ${p.name} has no home`);
            const load = slots[i].bytes == 1 ? 'LD A,0' : 'LD HL,0';
            const store = slots[i].bytes == 1 ? storeA(home) : storeHL(home);
            return [
                label(`${base}_op`),
                ins(load, `Slot for ${p.name}, patched by callers`),
                raw(`${slots[i].label} EQU ${base}_op+1`),
                ...store,
            ];
        })
        .flat();
};

const framePrologue = (frameSize: number): Line[] => [
    ins('PUSH IX', 'Set up frame'),
    ins('LD IX,0'),
    ins('ADD IX,SP'),
    ...(frameSize > 0 ? [ins(`LD HL,-${frameSize}`, 'Reserve locals'), ins('ADD HL,SP'), ins('LD SP,HL')] : []),
];

const functionToZ80 = (f: Function, program: Program, externs: Externs, options: EmitOptions): string => {
    const sym = symbolToString(f.symbol);
    const smc = f.convention == 'smc';
    const { homes, frameSize } = smc ? { homes: staticHomes(f), frameSize: 0 } : frameHomes(f);
    const ctx: Context = { f, program, homes, externs, makeLabel: idAppender() };
    const epilogue = smc ? null : `${sym}_epilogue`;
    const body = f.instructions.map(tas => withWhy(statementToZ80(ctx, tas, epilogue), tas)).flat();

    const lines: Line[] = [
        raw(`${descriptor.commentPrefix} ${f.convention} convention`),
        label(sym),
        ...(smc ? smcPrologue(f, homes) : framePrologue(frameSize)),
        ...body,
    ];
    if (epilogue) {
        lines.push(label(epilogue), ins('LD SP,IX'), ins('POP IX'), ins('RET'));
    } else {
        f.registers.forEach(r => {
            const home = homes.get(r.id);
            if (home && home.kind == 'static') lines.push(label(home.label), ins(`DS ${sizeOf(r.type)}`));
        });
    }
    return linesToString(lines, descriptor, options);
};

const patchTable = (program: Program): Line[] => {
    const smcFunctions = program.functions.filter(f => f.convention == 'smc');
    if (smcFunctions.length == 0) return [];
    const entries = smcFunctions
        .map(f => smcSlots(f).map(slot => [ins(`DW ${slot.label}`), ins(`DB ${slot.bytes}`)]).flat())
        .flat();
    return [label('PATCH_TABLE'), ...entries, ins('DW 0', 'End of table')];
};

const dataDirectives = { byte: 'DB', word: 'DW', space: 'DS' };

const globalToZ80 = (g: GlobalVariable): Line[] => [
    label(globalName(g)),
    ...littleEndianData(g.type, g.initializer, descriptor.pointerBits, dataDirectives).map(text => ins(text)),
];

const stringToZ80 = (literal: StringLiteral): Line[] => {
    const name = stringLiteralName(literal);
    const bytes = Array.from(literal.value).map(c => `${c.charCodeAt(0) & 0xff}`);
    return [
        label(name),
        ins(`DW ${literal.value.length},${name}_data`),
        label(`${name}_data`),
        ...(bytes.length > 0 ? [ins(`DB ${join(bytes, ',')}`)] : []),
    ];
};

const emit = (program: Program, options: EmitOptions): EmitResult => {
    const externs = new Externs();
    return finish(
        emitEach(program, descriptor, f => functionToZ80(f, program, externs, options)),
        functions => {
            const data = linesToString(
                [
                    ...patchTable(program),
                    ...program.globals.map(globalToZ80).flat(),
                    ...program.stringLiterals.map(stringToZ80).flat(),
                ],
                descriptor,
                options
            );
            const header = [
                `${descriptor.commentPrefix} Module ${program.module}, generated for ${descriptor.description}`,
                ...externs.all.map(name => `    EXTERN ${name}`),
            ];
            return `${join([join(header, '\n'), ...functions, data], '\n\n')}\n`;
        }
    );
};

const z80Backend: Backend = {
    descriptor,
    emit,
    executors: [],
};
export default z80Backend;
