import { Program, GlobalVariable, StringLiteral, globalName, stringLiteralName, findFunction } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { Register } from '../threeAddressCode/Register';
import { Statement, BinaryOperator, CallTarget, SymbolReference, writes, reads } from '../threeAddressCode/Statement';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { runtimeFunctions, RuntimeFunctionName } from '../threeAddressCode/runtime';
import { Comparison } from '../ast';
import { Backend, EmitOptions, EmitResult } from '../api';
import { targets } from '../TargetDescriptor';
import { Type, Scalar, valueBits, isSigned, fixedPointShift, wrap, one, toString as typeToString } from '../types';
import { controlFlowGraph, BasicBlock } from '../controlFlowGraph';
import { Line, label, raw, instruction as ins, linesToString, withWhy, emitEach, finish, pointee, Externs } from './shared';
import debug from '../util/debug';
import unhandled from '../util/never';
import join from '../util/join';

const descriptor = targets.llvm;

export const llType = (type: Type): string => {
    switch (type.kind) {
        case 'Boolean':
            return 'i1';
        case 'Integer':
        case 'FixedPoint':
            // 24 bit values get a native i24 rather than 32 bits of storage
            return `i${valueBits(type)}`;
        case 'Pointer':
            return 'ptr';
        case 'Void':
            return 'void';
        case 'String':
            return '%String';
        case 'Array':
            return `[${type.length} x ${llType(type.of)}]`;
        case 'TypeParameter':
            throw debug(`unsubstituted type parameter ${type.name}`);
        default:
            return unhandled(type, 'llType');
    }
};

const symbolName = (symbol: SymbolReference): string =>
    symbol.kind == 'global' ? `@${globalName(symbol)}` : `@${stringLiteralName(symbol)}`;

// How the emitted code refers to a register: a literal, an SSA value, or a stack slot it loads and stores.
type Storage = { kind: 'constant'; text: string } | { kind: 'value' } | { kind: 'slot' };

const literal = (value: number, type: Scalar): string => {
    if (type.kind == 'Boolean') return value == 0 ? 'false' : 'true';
    if (type.kind == 'Pointer') {
        if (value != 0) throw debug('non-null pointer constant');
        return 'null';
    }
    return `${wrap(value, type)}`;
};

// Registers written once and read only later in the same block become SSA values; constants fold into
// their uses; everything else lives in an alloca.
const classify = (f: Function, blocks: BasicBlock[]): Map<number, Storage> => {
    const definitions = new Map<number, { tas: Statement; block: number; position: number }[]>();
    const uses = new Map<number, { block: number; position: number }[]>();
    blocks.forEach((block, blockIndex) =>
        block.instructions.forEach((tas, position) => {
            writes(tas).forEach(r => definitions.set(r.id, [...(definitions.get(r.id) ?? []), { tas, block: blockIndex, position }]));
            reads(tas).forEach(r => uses.set(r.id, [...(uses.get(r.id) ?? []), { block: blockIndex, position }]));
        })
    );
    const parameterIds = new Set(f.parameters.map(p => p.register.id));
    const storage = new Map<number, Storage>();
    f.registers.forEach(r => {
        const defs = definitions.get(r.id) ?? [];
        if (parameterIds.has(r.id) || defs.length != 1) {
            storage.set(r.id, { kind: 'slot' });
            return;
        }
        const [{ tas, block, position }] = defs;
        if (tas.kind == 'loadImmediate') {
            storage.set(r.id, { kind: 'constant', text: literal(tas.value, r.type) });
        } else if (tas.kind == 'addressOf') {
            storage.set(r.id, { kind: 'constant', text: symbolName(tas.symbol) });
        } else if (
            tas.kind != 'move' &&
            tas.kind != 'increment' &&
            tas.kind != 'decrement' &&
            (uses.get(r.id) ?? []).every(u => u.block == block && u.position > position)
        ) {
            storage.set(r.id, { kind: 'value' });
        } else {
            storage.set(r.id, { kind: 'slot' });
        }
    });
    return storage;
};

type Context = {
    f: Function;
    program: Program;
    storage: Map<number, Storage>;
    externs: Externs;
    // Instructions of the statement being translated
    lines: Line[];
    nextTemporary: () => string;
};

const storageOf = (ctx: Context, r: Register): Storage => {
    const s = ctx.storage.get(r.id);
    if (!s) throw debug(`r${r.id} was not classified`);
    return s;
};

const emitLine = (ctx: Context, text: string) => {
    ctx.lines.push(ins(text));
};

// Compute an expression into a fresh temporary.
const temporary = (ctx: Context, expression: string): string => {
    const name = ctx.nextTemporary();
    emitLine(ctx, `${name} = ${expression}`);
    return name;
};

const use = (ctx: Context, r: Register): string => {
    const s = storageOf(ctx, r);
    switch (s.kind) {
        case 'constant':
            return s.text;
        case 'value':
            return `%r${r.id}`;
        case 'slot':
            return temporary(ctx, `load ${llType(r.type)}, ptr %r${r.id}.addr`);
        default:
            return unhandled(s, 'use');
    }
};

const define = (ctx: Context, r: Register, expression: string) => {
    const s = storageOf(ctx, r);
    switch (s.kind) {
        case 'constant':
            // Folded into every use
            return;
        case 'value':
            emitLine(ctx, `%r${r.id} = ${expression}`);
            return;
        case 'slot':
            emitLine(ctx, `store ${llType(r.type)} ${temporary(ctx, expression)}, ptr %r${r.id}.addr`);
            return;
        default:
            unhandled(s, 'define');
    }
};

const plainOperation: { [O in BinaryOperator]?: string } = {
    add: 'add',
    subtract: 'sub',
    multiply: 'mul',
    and: 'and',
    or: 'or',
    xor: 'xor',
};

const widen = (ctx: Context, type: Scalar, value: string): string =>
    temporary(ctx, `${isSigned(type) ? 'sext' : 'zext'} ${llType(type)} ${value} to i64`);

const binaryOperation = (ctx: Context, operator: BinaryOperator, type: Scalar, lhs: string, rhs: string): string => {
    const t = llType(type);
    const bits = valueBits(type);
    if (bits === null) throw debug('arithmetic on a pointer');
    const signed = isSigned(type);
    if (type.kind == 'FixedPoint' && (operator == 'multiply' || operator == 'divide')) {
        const shift = fixedPointShift(type);
        const a = widen(ctx, type, lhs);
        const b = widen(ctx, type, rhs);
        const wide =
            operator == 'multiply'
                ? temporary(ctx, `ashr i64 ${temporary(ctx, `mul i64 ${a}, ${b}`)}, ${shift}`)
                : temporary(ctx, `sdiv i64 ${temporary(ctx, `shl i64 ${a}, ${shift}`)}, ${b}`);
        return `trunc i64 ${wide} to ${t}`;
    }
    const plain = plainOperation[operator];
    if (plain) return `${plain} ${t} ${lhs}, ${rhs}`;
    switch (operator) {
        case 'divide':
            return `${signed ? 'sdiv' : 'udiv'} ${t} ${lhs}, ${rhs}`;
        case 'modulo':
            return `${signed ? 'srem' : 'urem'} ${t} ${lhs}, ${rhs}`;
        case 'shiftLeft':
        case 'shiftRight': {
            // Oversized shifts are poison, so pick the saturated result instead
            const inRange = temporary(ctx, `icmp ult ${t} ${rhs}, ${bits}`);
            const mnemonic = operator == 'shiftLeft' ? 'shl' : signed ? 'ashr' : 'lshr';
            const shifted = temporary(ctx, `${mnemonic} ${t} ${lhs}, ${rhs}`);
            const saturated =
                operator == 'shiftRight' && signed ? temporary(ctx, `ashr ${t} ${lhs}, ${bits - 1}`) : '0';
            return `select i1 ${inRange}, ${t} ${shifted}, ${t} ${saturated}`;
        }
        default:
            throw debug(`operator ${operator} should have been handled`);
    }
};

const predicate = (comparison: Comparison, signed: boolean): string => {
    const s = signed ? 's' : 'u';
    switch (comparison) {
        case '==':
            return 'eq';
        case '!=':
            return 'ne';
        case '<':
            return `${s}lt`;
        case '<=':
            return `${s}le`;
        case '>':
            return `${s}gt`;
        case '>=':
            return `${s}ge`;
        default:
            return unhandled(comparison, 'predicate');
    }
};

const zero = (type: Scalar): string => (type.kind == 'Pointer' ? 'null' : type.kind == 'Boolean' ? 'false' : '0');

const conversion = (ctx: Context, from: Scalar, to: Scalar, value: string): string => {
    if (to.kind == 'Boolean') return `icmp ne ${llType(from)} ${value}, ${zero(from)}`;
    if (to.kind == 'Pointer' || from.kind == 'Pointer') return `bitcast ptr ${value} to ptr`;
    const fromShift = from.kind == 'FixedPoint' ? fixedPointShift(from) : 0;
    const toShift = to.kind == 'FixedPoint' ? fixedPointShift(to) : 0;
    let wide = widen(ctx, from, value);
    if (toShift > fromShift) wide = temporary(ctx, `shl i64 ${wide}, ${toShift - fromShift}`);
    if (toShift < fromShift) wide = temporary(ctx, `ashr i64 ${wide}, ${fromShift - toShift}`);
    return `trunc i64 ${wide} to ${llType(to)}`;
};

const callee = (ctx: Context, target: CallTarget): { name: string; returnType: string } => {
    if (target.kind == 'runtime') return { name: `@${ctx.externs.use(target.name)}`, returnType: 'void' };
    const f = findFunction(ctx.program, target.symbol);
    if (!f) throw debug(`call to missing function ${symbolToString(target.symbol)}`);
    return { name: `@${symbolToString(f.symbol)}`, returnType: llType(f.returnType) };
};

const statementToSsa = (ctx: Context, tas: Statement, next: string | null): void => {
    switch (tas.kind) {
        case 'loadImmediate':
            if (storageOf(ctx, tas.destination).kind == 'slot') {
                const t = llType(tas.destination.type);
                emitLine(ctx, `store ${t} ${literal(tas.value, tas.destination.type)}, ptr %r${tas.destination.id}.addr`);
            }
            return;
        case 'move': {
            const value = use(ctx, tas.from);
            emitLine(ctx, `store ${llType(tas.to.type)} ${value}, ptr %r${tas.to.id}.addr`);
            return;
        }
        case 'binaryOperation': {
            const lhs = use(ctx, tas.lhs);
            const rhs = use(ctx, tas.rhs);
            define(ctx, tas.destination, binaryOperation(ctx, tas.operator, tas.destination.type, lhs, rhs));
            return;
        }
        case 'compare': {
            const lhs = use(ctx, tas.lhs);
            const rhs = use(ctx, tas.rhs);
            const p = predicate(tas.comparison, isSigned(tas.lhs.type));
            define(ctx, tas.destination, `icmp ${p} ${llType(tas.lhs.type)} ${lhs}, ${rhs}`);
            return;
        }
        case 'testZero': {
            const source = use(ctx, tas.source);
            const type = tas.source.type;
            define(ctx, tas.destination, `icmp ${tas.negated ? 'ne' : 'eq'} ${llType(type)} ${source}, ${zero(type)}`);
            return;
        }
        case 'convert': {
            const value = use(ctx, tas.from);
            define(ctx, tas.to, conversion(ctx, tas.from.type, tas.to.type, value));
            return;
        }
        case 'increment':
        case 'decrement': {
            const type = tas.register.type;
            if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${typeToString(type)}`);
            const value = use(ctx, tas.register);
            const amount = wrap(one(type), type);
            define(ctx, tas.register, `${tas.kind == 'increment' ? 'add' : 'sub'} ${llType(type)} ${value}, ${amount}`);
            return;
        }
        case 'label':
            // Block boundaries are handled by the caller
            return;
        case 'goto':
            emitLine(ctx, `br label %${tas.label}`);
            return;
        case 'gotoIfFalse': {
            if (!next) throw debug(`conditional branch to ${tas.label} at the end of the function`);
            const condition = use(ctx, tas.condition);
            emitLine(ctx, `br i1 ${condition}, label %${next}, label %${tas.label}`);
            return;
        }
        case 'call': {
            const args = tas.arguments.map(a => `${llType(a.type)} ${use(ctx, a)}`);
            const { name, returnType } = callee(ctx, tas.target);
            const call = `call ${returnType} ${name}(${join(args, ', ')})`;
            if (tas.destination) {
                define(ctx, tas.destination, call);
            } else {
                emitLine(ctx, call);
            }
            return;
        }
        case 'return': {
            const register = tas.register;
            emitLine(ctx, register ? `ret ${llType(register.type)} ${use(ctx, register)}` : 'ret void');
            return;
        }
        case 'addressOf':
            if (storageOf(ctx, tas.destination).kind == 'slot') {
                emitLine(ctx, `store ptr ${symbolName(tas.symbol)}, ptr %r${tas.destination.id}.addr`);
            }
            return;
        case 'arrayIndex': {
            const base = use(ctx, tas.base);
            const index = widen(ctx, tas.index.type, use(ctx, tas.index));
            define(ctx, tas.destination, `getelementptr ${llType(pointee(tas.base.type))}, ptr ${base}, i64 ${index}`);
            return;
        }
        case 'load': {
            const address = use(ctx, tas.address);
            define(ctx, tas.destination, `load ${llType(tas.destination.type)}, ptr ${address}`);
            return;
        }
        case 'store': {
            const address = use(ctx, tas.address);
            const value = use(ctx, tas.value);
            emitLine(ctx, `store ${llType(tas.value.type)} ${value}, ptr ${address}`);
            return;
        }
        default:
            unhandled(tas, 'statementToSsa');
    }
};

const isTerminator = (tas: Statement | undefined): boolean =>
    tas !== undefined && (tas.kind == 'goto' || tas.kind == 'gotoIfFalse' || tas.kind == 'return');

const functionToSsa = (f: Function, program: Program, externs: Externs, options: EmitOptions): string => {
    const { blocks } = controlFlowGraph(f.instructions);
    const storage = classify(f, blocks);
    let temporaries = 0;
    const ctx: Context = {
        f,
        program,
        storage,
        externs,
        lines: [],
        nextTemporary: () => {
            temporaries++;
            return `%t${temporaries}`;
        },
    };
    const blockNames = blocks.map((block, index) => block.name ?? `bb${index}`);

    const parameters = f.parameters.map(p => `${llType(p.register.type)} %r${p.register.id}.arg`);
    const allocas = f.registers
        .filter(r => storageOf(ctx, r).kind == 'slot')
        .map(r => ins(`%r${r.id}.addr = alloca ${llType(r.type)}`));
    const spills = f.parameters.map(p =>
        ins(`store ${llType(p.register.type)} %r${p.register.id}.arg, ptr %r${p.register.id}.addr`, `Parameter ${p.name}`)
    );
    const lines: Line[] = [
        raw(`define ${llType(f.returnType)} @${symbolToString(f.symbol)}(${join(parameters, ', ')}) {`),
        label('entry'),
        ...allocas,
        ...spills,
        ins(blockNames.length > 0 ? `br label %${blockNames[0]}` : 'unreachable'),
    ];
    blocks.forEach((block, index) => {
        const next = index + 1 < blockNames.length ? blockNames[index + 1] : null;
        lines.push(label(blockNames[index]));
        block.instructions.forEach(tas => {
            ctx.lines = [];
            statementToSsa(ctx, tas, next);
            lines.push(...withWhy(ctx.lines, tas));
        });
        const last = block.instructions[block.instructions.length - 1];
        if (!isTerminator(last)) lines.push(ins(next ? `br label %${next}` : 'unreachable'));
    });
    lines.push(raw('}'));
    return linesToString(lines, descriptor, options);
};

const escape = (value: string): string =>
    Array.from(value)
        .map(c => {
            const code = c.charCodeAt(0) & 0xff;
            const printable = code >= 0x20 && code < 0x7f && c != '"' && c != '\\';
            return printable ? c : `\\${code.toString(16).toUpperCase().padStart(2, '0')}`;
        })
        .join('');

const stringToSsa = (literal: StringLiteral): string => {
    const name = stringLiteralName(literal);
    const length = literal.value.length;
    return join(
        [
            `@${name}.data = private constant [${length} x i8] c"${escape(literal.value)}"`,
            `@${name} = private constant %String { i16 ${length}, ptr @${name}.data }`,
        ],
        '\n'
    );
};

const initializer = (type: Type, value: number | number[] | undefined): string => {
    if (value === undefined) return 'zeroinitializer';
    if (type.kind == 'Array') {
        const values = Array.isArray(value) ? [...value] : [value];
        while (values.length < type.length) values.push(0);
        return `[${join(values.map(v => `${llType(type.of)} ${initializer(type.of, v)}`), ', ')}]`;
    }
    if (Array.isArray(value)) throw debug('array initializer for a scalar');
    if (type.kind == 'Integer' || type.kind == 'FixedPoint' || type.kind == 'Boolean') return literal(value, type);
    throw debug(`no initializer for ${typeToString(type)}`);
};

const globalToSsa = (g: GlobalVariable): string =>
    `@${globalName(g)} = global ${llType(g.type)} ${initializer(g.type, g.initializer)}`;

const runtimeDeclaration = (name: RuntimeFunctionName): string =>
    `declare void @${name}(${join(runtimeFunctions[name].parameters.map(llType), ', ')})`;

const isRuntimeFunctionName = (name: string): name is RuntimeFunctionName =>
    Object.keys(runtimeFunctions).some(n => n == name);

const emit = (program: Program, options: EmitOptions): EmitResult => {
    const externs = new Externs();
    return finish(
        emitEach(program, descriptor, f => functionToSsa(f, program, externs, options)),
        functions => {
            const main = program.functions.find(
                f => f.symbol.name == 'main' && f.symbol.mangling.length == 0 && f.parameters.length == 0
            );
            const sections = [
                `${descriptor.commentPrefix} Module ${program.module}, generated for ${descriptor.description}\n%String = type { i16, ptr }`,
                ...program.stringLiterals.map(stringToSsa),
                ...program.globals.map(globalToSsa),
                ...externs.all.filter(isRuntimeFunctionName).map(runtimeDeclaration),
                ...functions,
            ];
            if (main) {
                sections.push(
                    `define i32 @main() {\n    call ${llType(main.returnType)} @${symbolToString(main.symbol)}()\n    ret i32 0\n}`
                );
            }
            return `${join(sections, '\n\n')}\n`;
        }
    );
};

const ssaBackend: Backend = {
    descriptor,
    emit,
    executors: [],
};
export default ssaBackend;
