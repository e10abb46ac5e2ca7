import debug from './util/debug';
import unhandled from './util/never';
import { Program, GlobalVariable, globalName, stringLiteralName, findFunction } from './threeAddressCode/Program';
import { Function } from './threeAddressCode/Function';
import { Register } from './threeAddressCode/Register';
import { Statement, BinaryOperator, SymbolReference } from './threeAddressCode/Statement';
import { FunctionSymbol, symbolToString } from './threeAddressCode/FunctionSymbol';
import { RuntimeFunctionName } from './threeAddressCode/runtime';
import { Comparison } from './ast';
import { Scalar, wrap, valueBits, isSigned, fixedPointShift, one, toString as typeToString } from './types';

// Memory is a set of named blocks of cells. A cell holds one scalar, whatever its width.
export type Pointer = { block: string; offset: number };
export type Value = number | Pointer;

export type State = {
    memory: { [block: string]: Value[] };
    stdout: string[];
    cycles: number;
    callDepth: number;
    maxCallDepth: number;
};

export type InterpreterOptions = { maxCycles: number };

export type InterpreterResult =
    | { value: Value | null; stdout: string; cycles: number; maxCallDepth: number }
    | { error: string; stdout: string };

const defaultOptions: InterpreterOptions = { maxCycles: 1000000 };

// A runtime fault in the interpreted program, as opposed to a bug in the interpreter.
class ExecutionFailure extends Error {}

const fail = (message: string): never => {
    throw new ExecutionFailure(message);
};

const isPointer = (v: Value): v is Pointer => typeof v !== 'number';

const globalCells = (g: GlobalVariable): Value[] => {
    if (g.type.kind == 'Array') {
        const cells: Value[] = new Array(g.type.length).fill(0);
        if (Array.isArray(g.initializer)) g.initializer.forEach((v, i) => (cells[i] = v));
        return cells;
    }
    return [typeof g.initializer == 'number' ? g.initializer : 0];
};

export const createInitialState = ({ globals, stringLiterals }: Program): State => {
    const memory: { [block: string]: Value[] } = {};
    globals.forEach(g => {
        memory[globalName(g)] = globalCells(g);
    });
    stringLiterals.forEach(literal => {
        const name = stringLiteralName(literal);
        const data = `${name}.data`;
        memory[name] = [literal.value.length, { block: data, offset: 0 }];
        memory[data] = Array.from(literal.value).map(c => c.charCodeAt(0));
    });
    return { memory, stdout: [], cycles: 0, callDepth: 0, maxCallDepth: 0 };
};

const shiftCount = (count: number, bits: number): number | null => (count < 0 || count >= bits ? null : count);

export const evaluateBinaryOperation = (operator: BinaryOperator, type: Scalar, lhs: number, rhs: number): number => {
    const bits = valueBits(type);
    if (bits === null) throw debug(`arithmetic on pointer type ${typeToString(type)}`);
    const scale = type.kind == 'FixedPoint' ? 2 ** fixedPointShift(type) : 1;
    switch (operator) {
        case 'add':
            return wrap(lhs + rhs, type);
        case 'subtract':
            return wrap(lhs - rhs, type);
        case 'multiply':
            if (type.kind == 'FixedPoint') return wrap(Math.floor((lhs * rhs) / scale), type);
            // Products of 32 bit operands lose precision as doubles
            return wrap(bits == 32 ? Math.imul(lhs, rhs) : lhs * rhs, type);
        case 'divide':
            if (rhs == 0) return fail('division by zero');
            return wrap(Math.trunc((lhs * scale) / rhs), type);
        case 'modulo':
            if (rhs == 0) return fail('division by zero');
            return wrap(lhs % rhs, type);
        case 'and':
            return wrap(lhs & rhs, type);
        case 'or':
            return wrap(lhs | rhs, type);
        case 'xor':
            return wrap(lhs ^ rhs, type);
        case 'shiftLeft': {
            const count = shiftCount(rhs, bits);
            return count === null ? 0 : wrap(lhs * 2 ** count, type);
        }
        case 'shiftRight': {
            const count = shiftCount(rhs, bits);
            if (count === null) return isSigned(type) && lhs < 0 ? -1 : 0;
            return wrap(Math.floor(lhs / 2 ** count), type);
        }
        default:
            return unhandled(operator, 'evaluateBinaryOperation');
    }
};

export const evaluateComparison = (comparison: Comparison, lhs: Value, rhs: Value): boolean => {
    if (isPointer(lhs) || isPointer(rhs)) {
        const same = isPointer(lhs) && isPointer(rhs) && lhs.block == rhs.block && lhs.offset == rhs.offset;
        if (comparison == '==') return same;
        if (comparison == '!=') return !same;
        return fail(`ordering comparison ${comparison} on pointers`);
    }
    switch (comparison) {
        case '==':
            return lhs == rhs;
        case '!=':
            return lhs != rhs;
        case '<':
            return lhs < rhs;
        case '<=':
            return lhs <= rhs;
        case '>':
            return lhs > rhs;
        case '>=':
            return lhs >= rhs;
        default:
            return unhandled(comparison, 'evaluateComparison');
    }
};

export const evaluateConversion = (value: number, from: Scalar, to: Scalar): number => {
    if (to.kind == 'Boolean') return value == 0 ? 0 : 1;
    if (to.kind == 'Pointer' || from.kind == 'Pointer') throw debug('numeric conversion involving a pointer');
    const fromShift = from.kind == 'FixedPoint' ? fixedPointShift(from) : 0;
    const toShift = to.kind == 'FixedPoint' ? fixedPointShift(to) : 0;
    if (toShift >= fromShift) return wrap(value * 2 ** (toShift - fromShift), to);
    return wrap(Math.floor(value / 2 ** (fromShift - toShift)), to);
};

const printRuntime = (name: RuntimeFunctionName, args: Value[], state: State) => {
    const number = (i: number): number => {
        const v = args[i];
        return isPointer(v) ? fail(`${name} expects a number`) : v;
    };
    switch (name) {
        case 'print_char':
            state.stdout.push(String.fromCharCode(number(0)));
            return;
        case 'print_u8':
        case 'print_u16':
        case 'print_u24':
        case 'print_u32':
        case 'print_i8':
        case 'print_i16':
        case 'print_i24':
        case 'print_i32':
            state.stdout.push(`${number(0)}`);
            return;
        case 'print_bool':
            state.stdout.push(number(0) ? 'true' : 'false');
            return;
        case 'print_newline':
            state.stdout.push('\n');
            return;
        case 'print_string': {
            const string = args[0];
            if (!isPointer(string)) return fail('print_string expects a pointer');
            const length = readMemory(state, string);
            const data = readMemory(state, { block: string.block, offset: string.offset + 1 });
            if (isPointer(length) || !isPointer(data)) return fail('malformed string');
            for (let i = 0; i < length; i++) {
                const c = readMemory(state, { block: data.block, offset: data.offset + i });
                if (isPointer(c)) return fail('pointer stored in string data');
                state.stdout.push(String.fromCharCode(c));
            }
            return;
        }
        default:
            unhandled(name, 'printRuntime');
    }
};

const cellsOf = (state: State, { block, offset }: Pointer): Value[] => {
    const cells = state.memory[block];
    if (!cells) return fail(`no memory block ${block}`);
    if (offset < 0 || offset >= cells.length) return fail(`access to ${block}[${offset}] out of bounds`);
    return cells;
};

const readMemory = (state: State, address: Pointer): Value => cellsOf(state, address)[address.offset];

const writeMemory = (state: State, address: Pointer, value: Value) => {
    cellsOf(state, address)[address.offset] = value;
};

const addressOf = (symbol: SymbolReference): Pointer =>
    symbol.kind == 'global'
        ? { block: globalName(symbol), offset: 0 }
        : { block: stringLiteralName(symbol), offset: 0 };

const runFunction = (
    program: Program,
    f: Function,
    args: Value[],
    state: State,
    options: InterpreterOptions
): Value | null => {
    if (args.length != f.parameters.length) {
        return fail(`${symbolToString(f.symbol)} takes ${f.parameters.length} arguments, got ${args.length}`);
    }
    state.callDepth++;
    state.maxCallDepth = Math.max(state.maxCallDepth, state.callDepth);

    const registerValues = new Map<number, Value>();
    f.parameters.forEach((p, i) => registerValues.set(p.register.id, args[i]));

    const get = (r: Register): Value => {
        const value = registerValues.get(r.id);
        if (value === undefined) return fail(`read of uninitialized r${r.id} in ${symbolToString(f.symbol)}`);
        return value;
    };
    const getNumber = (r: Register): number => {
        const value = get(r);
        return isPointer(value) ? fail(`r${r.id} holds a pointer, expected a number`) : value;
    };
    const getPointer = (r: Register): Pointer => {
        const value = get(r);
        return isPointer(value) ? value : fail(`r${r.id} holds a number, expected a pointer`);
    };
    const set = (r: Register, value: Value) => {
        registerValues.set(r.id, value);
    };

    let ip = 0;
    const gotoLabel = (name: string) => {
        ip = f.instructions.findIndex(target => target.kind == 'label' && target.name == name);
        if (ip === -1) throw debug(`no label ${name} in ${symbolToString(f.symbol)}`);
    };

    while (ip < f.instructions.length) {
        state.cycles++;
        if (state.cycles > options.maxCycles) return fail(`exceeded ${options.maxCycles} cycles`);
        const tas: Statement = f.instructions[ip];
        ip++;
        switch (tas.kind) {
            case 'loadImmediate':
                set(tas.destination, tas.value);
                break;
            case 'move':
                set(tas.to, get(tas.from));
                break;
            case 'binaryOperation':
                set(
                    tas.destination,
                    evaluateBinaryOperation(tas.operator, tas.destination.type, getNumber(tas.lhs), getNumber(tas.rhs))
                );
                break;
            case 'compare':
                set(tas.destination, evaluateComparison(tas.comparison, get(tas.lhs), get(tas.rhs)) ? 1 : 0);
                break;
            case 'testZero': {
                const source = get(tas.source);
                // Pointers are never null
                const isZero = !isPointer(source) && source == 0;
                set(tas.destination, isZero != tas.negated ? 1 : 0);
                break;
            }
            case 'convert':
                if (tas.to.type.kind == 'Pointer') {
                    set(tas.to, getPointer(tas.from));
                } else {
                    set(tas.to, evaluateConversion(getNumber(tas.from), tas.from.type, tas.to.type));
                }
                break;
            case 'increment':
            case 'decrement': {
                const type = tas.register.type;
                if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${typeToString(type)}`);
                set(
                    tas.register,
                    evaluateBinaryOperation(
                        tas.kind == 'increment' ? 'add' : 'subtract',
                        type,
                        getNumber(tas.register),
                        one(type)
                    )
                );
                break;
            }
            case 'label':
                break;
            case 'goto':
                gotoLabel(tas.label);
                break;
            case 'gotoIfFalse':
                if (getNumber(tas.condition) == 0) gotoLabel(tas.label);
                break;
            case 'call': {
                const args = tas.arguments.map(get);
                if (tas.target.kind == 'runtime') {
                    printRuntime(tas.target.name, args, state);
                    break;
                }
                const callee = findFunction(program, tas.target.symbol);
                if (!callee) throw debug(`call to missing function ${symbolToString(tas.target.symbol)}`);
                const result = runFunction(program, callee, args, state, options);
                if (tas.destination) {
                    if (result === null) return fail(`${symbolToString(callee.symbol)} returned no value`);
                    set(tas.destination, result);
                }
                break;
            }
            case 'return':
                state.callDepth--;
                return tas.register ? get(tas.register) : null;
            case 'addressOf':
                set(tas.destination, addressOf(tas.symbol));
                break;
            case 'arrayIndex': {
                const base = getPointer(tas.base);
                set(tas.destination, { block: base.block, offset: base.offset + getNumber(tas.index) });
                break;
            }
            case 'load':
                set(tas.destination, readMemory(state, getPointer(tas.address)));
                break;
            case 'store':
                writeMemory(state, getPointer(tas.address), get(tas.value));
                break;
            default:
                unhandled(tas, 'interpretFunction');
        }
    }
    return fail(`${symbolToString(f.symbol)} ran past its last instruction`);
};

export const interpretFunction = (
    program: Program,
    symbol: FunctionSymbol,
    args: Value[],
    options: Partial<InterpreterOptions> = {}
): InterpreterResult => {
    const state = createInitialState(program);
    const f = findFunction(program, symbol);
    if (!f) return { error: `no function ${symbolToString(symbol)}`, stdout: '' };
    try {
        const value = runFunction(program, f, args, state, { ...defaultOptions, ...options });
        return { value, stdout: state.stdout.join(''), cycles: state.cycles, maxCallDepth: state.maxCallDepth };
    } catch (e) {
        if (!(e instanceof ExecutionFailure)) throw e;
        return { error: e.message, stdout: state.stdout.join('') };
    }
};

// Runs the module's main function, if it has one.
export const interpretProgram = (program: Program, options: Partial<InterpreterOptions> = {}): InterpreterResult =>
    interpretFunction(program, { module: program.module, name: 'main', mangling: [] }, [], options);
