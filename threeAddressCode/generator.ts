import * as Ast from '../ast';
import {
    Type,
    Scalar,
    builtinTypes,
    pointerTo,
    substitute,
    isScalar,
    isNumeric,
    equal as typesAreEqual,
    fixedPointShift,
    wrap,
    toString as typeToString,
} from '../types';
import { Register, RegisterArena } from './Register';
import { Statement, BinaryOperator } from './Statement';
import { Function, Local, Parameter } from './Function';
import { FunctionSymbol, symbolToString } from './FunctionSymbol';
import { Program, GlobalVariable, StringLiteral } from './Program';
import { InstantiationCache, Instance } from './instantiation';
import { runtimeFunctions } from './runtime';
import { CompileError } from '../CompileError';
import { CompileOptions } from '../options';
import idAppender from '../util/idAppender';
import debug from '../util/debug';
import unhandled from '../util/never';

export type LoweringResult = { program: Program } | { errors: CompileError[] };

// Thrown inside one function's lowering, caught at the function boundary and turned into a result.
class LoweringFailure extends Error {
    constructor(readonly error: CompileError) {
        super(error.kind);
    }
}

const binaryOperators: { [O in Ast.BinaryOperator]: BinaryOperator } = {
    '+': 'add',
    '-': 'subtract',
    '*': 'multiply',
    '/': 'divide',
    '%': 'modulo',
    '&': 'and',
    '|': 'or',
    '^': 'xor',
    '<<': 'shiftLeft',
    '>>': 'shiftRight',
};

const isAstBinaryOperator = (operator: string): operator is Ast.BinaryOperator => operator in binaryOperators;

// Append-only, deduplicated by value, shared by the whole program.
class StringPool {
    private readonly literals: StringLiteral[] = [];

    intern(value: string): number {
        const existing = this.literals.find(l => l.value == value);
        if (existing) return existing.index;
        const index = this.literals.length;
        this.literals.push({ index, value });
        return index;
    }

    get all(): StringLiteral[] {
        return [...this.literals];
    }
}

type ProgramContext = {
    module: Ast.Module;
    strings: StringPool;
    globals: GlobalVariable[];
    cache: InstantiationCache;
};

type FunctionContext = {
    program: ProgramContext;
    declaration: Ast.FunctionDeclaration;
    symbolText: string;
    bindings: Map<string, Type>;
    arena: RegisterArena;
    variables: Map<string, Register>;
    locals: Local[];
    instructions: Statement[];
    makeLabel: (name: string) => string;
};

const unsupported = (ctx: FunctionContext, construct: string, where?: Ast.SourceLocation): never => {
    throw new LoweringFailure({
        kind: 'unsupportedOperation',
        function: ctx.symbolText,
        construct,
        sourceLocation: where || ctx.declaration.sourceLocation,
    });
};

const emit = (ctx: FunctionContext, statement: Statement) => {
    ctx.instructions.push(statement);
};

const resolveScalar = (ctx: FunctionContext, type: Type, what: string, where?: Ast.SourceLocation): Scalar => {
    const resolved = substitute(type, ctx.bindings);
    if (!isScalar(resolved)) {
        return unsupported(ctx, `${what} of type ${typeToString(resolved)} does not fit in a register`, where);
    }
    return resolved;
};

const allocate = (ctx: FunctionContext, type: Scalar): Register => ctx.arena.allocate(type);

const findGlobal = (ctx: FunctionContext, name: string): GlobalVariable => {
    const global = ctx.program.globals.find(g => g.name == name);
    if (!global) throw debug(`front end passed unresolved global ${name}`);
    return global;
};

const findVariable = (ctx: FunctionContext, name: string): Register => {
    const register = ctx.variables.get(name);
    if (!register) throw debug(`front end passed unresolved identifier ${name}`);
    return register;
};

const encodeLiteral = (value: number, type: Scalar): number => {
    if (type.kind == 'FixedPoint') {
        return wrap(Math.round(value * 2 ** fixedPointShift(type)), type);
    }
    if (type.kind == 'Pointer') return value;
    return wrap(value, type);
};

// Compute address of global `name` into a fresh register typed as a pointer to `pointee`.
const globalAddress = (ctx: FunctionContext, global: GlobalVariable, pointee: Type, why: string): Register => {
    const address = allocate(ctx, pointerTo(pointee));
    emit(ctx, {
        kind: 'addressOf',
        symbol: { kind: 'global', module: global.module, name: global.name },
        destination: address,
        why,
    });
    return address;
};

// Element address for global array `name` at the given index.
const arrayElementAddress = (
    ctx: FunctionContext,
    name: string,
    index: Ast.Expression,
    where?: Ast.SourceLocation
): { address: Register; element: Scalar } => {
    const global = findGlobal(ctx, name);
    if (global.type.kind != 'Array') {
        return unsupported(ctx, `indexing ${name}, which is not an array`, where);
    }
    const element = resolveScalar(ctx, global.type.of, `element of ${name}`, where);
    const indexRegister = lowerExpression(ctx, index);
    const base = globalAddress(ctx, global, element, `Base of ${name}`);
    const address = allocate(ctx, pointerTo(element));
    emit(ctx, {
        kind: 'arrayIndex',
        base,
        index: indexRegister,
        destination: address,
        why: `Address of ${name}[${indexRegister.id}]`,
    });
    return { address, element };
};

const lowerCall = (
    ctx: FunctionContext,
    e: Extract<Ast.Expression, { kind: 'call' }>
): Register | null => {
    const { callee } = e;
    switch (callee.kind) {
        case 'runtime': {
            const runtime = runtimeFunctions[callee.name];
            if (!runtime) return unsupported(ctx, `unknown runtime function ${callee.name}`, e.sourceLocation);
            if (runtime.parameters.length != e.arguments.length) {
                return unsupported(
                    ctx,
                    `${callee.name} takes ${runtime.parameters.length} arguments, got ${e.arguments.length}`,
                    e.sourceLocation
                );
            }
            const args = e.arguments.map(a => lowerExpression(ctx, a));
            emit(ctx, {
                kind: 'call',
                target: { kind: 'runtime', name: callee.name },
                arguments: args,
                destination: null,
                why: `Call runtime ${callee.name}`,
            });
            return null;
        }
        case 'function':
        case 'generic': {
            const symbol = calleeSymbol(ctx, callee, e.sourceLocation);
            const args = e.arguments.map(a => lowerExpression(ctx, a));
            const returnType = substitute(e.type, ctx.bindings);
            const destination =
                returnType.kind == 'Void'
                    ? null
                    : allocate(ctx, resolveScalar(ctx, returnType, 'return value', e.sourceLocation));
            emit(ctx, {
                kind: 'call',
                target: { kind: 'function', symbol },
                arguments: args,
                destination,
                why: `Call ${symbolToString(symbol)}`,
            });
            return destination;
        }
        default:
            return unhandled(callee, 'lowerCall');
    }
};

const calleeSymbol = (
    ctx: FunctionContext,
    callee: Extract<Ast.Callee, { kind: 'function' | 'generic' }>,
    where?: Ast.SourceLocation
): FunctionSymbol => {
    const declaration = ctx.program.module.functions.find(f => f.name == callee.name);
    if (!declaration) throw debug(`front end passed unresolved function ${callee.name}`);
    if (callee.kind == 'function') {
        if (declaration.typeParameters.length > 0) {
            return unsupported(ctx, `calling generic ${callee.name} without type arguments`, where);
        }
        return { module: ctx.program.module.name, name: declaration.name, mangling: [] };
    }
    const typeArguments = callee.typeArguments.map(t => substitute(t, ctx.bindings));
    const result = ctx.program.cache.instantiate(declaration, typeArguments);
    if ('error' in result) throw new LoweringFailure(result.error);
    return result.instance.symbol;
};

const lowerExpression = (ctx: FunctionContext, e: Ast.Expression): Register => {
    const where = e.sourceLocation;
    switch (e.kind) {
        case 'number': {
            const type = resolveScalar(ctx, e.type, 'literal', where);
            if (type.kind == 'Boolean' || type.kind == 'Pointer') {
                return unsupported(ctx, `numeric literal of type ${typeToString(type)}`, where);
            }
            const destination = allocate(ctx, type);
            emit(ctx, {
                kind: 'loadImmediate',
                value: encodeLiteral(e.value, type),
                destination,
                why: `Literal ${e.value}`,
            });
            return destination;
        }
        case 'boolean': {
            const destination = allocate(ctx, builtinTypes.bool);
            emit(ctx, { kind: 'loadImmediate', value: e.value ? 1 : 0, destination, why: `Literal ${e.value}` });
            return destination;
        }
        case 'string': {
            const index = ctx.program.strings.intern(e.value);
            const destination = allocate(ctx, pointerTo(builtinTypes.string));
            emit(ctx, {
                kind: 'addressOf',
                symbol: { kind: 'string', index },
                destination,
                why: `String literal ${JSON.stringify(e.value)}`,
            });
            return destination;
        }
        case 'identifier': {
            const home = findVariable(ctx, e.name);
            const destination = allocate(ctx, home.type);
            emit(ctx, { kind: 'move', from: home, to: destination, why: `Read ${e.name}` });
            return destination;
        }
        case 'global': {
            const global = findGlobal(ctx, e.name);
            const type = resolveScalar(ctx, global.type, `global ${e.name}`, where);
            const address = globalAddress(ctx, global, type, `Address of ${e.name}`);
            const destination = allocate(ctx, type);
            emit(ctx, { kind: 'load', address, destination, why: `Read ${e.name}` });
            return destination;
        }
        case 'binaryOperation': {
            if (!isAstBinaryOperator(e.operator)) {
                return unsupported(ctx, `operator ${e.operator}`, where);
            }
            const type = resolveScalar(ctx, e.type, `result of ${e.operator}`, where);
            const lhs = lowerExpression(ctx, e.lhs);
            const rhs = lowerExpression(ctx, e.rhs);
            const bitwise = e.operator == '&' || e.operator == '|' || e.operator == '^';
            if (!isNumeric(type) && !(type.kind == 'Boolean' && bitwise)) {
                return unsupported(ctx, `operator ${e.operator} on ${typeToString(type)}`, where);
            }
            if (!typesAreEqual(lhs.type, type) || !typesAreEqual(rhs.type, type)) {
                return unsupported(
                    ctx,
                    `operator ${e.operator} mixing ${typeToString(lhs.type)} and ${typeToString(rhs.type)} without a conversion`,
                    where
                );
            }
            const destination = allocate(ctx, type);
            emit(ctx, {
                kind: 'binaryOperation',
                operator: binaryOperators[e.operator],
                lhs,
                rhs,
                destination,
                why: `${e.operator}`,
            });
            return destination;
        }
        case 'comparison': {
            const lhs = lowerExpression(ctx, e.lhs);
            const rhs = lowerExpression(ctx, e.rhs);
            if (!typesAreEqual(lhs.type, rhs.type)) {
                return unsupported(
                    ctx,
                    `comparing ${typeToString(lhs.type)} with ${typeToString(rhs.type)}`,
                    where
                );
            }
            if (lhs.type.kind == 'Pointer' && e.comparison != '==' && e.comparison != '!=') {
                return unsupported(ctx, `ordering comparison ${e.comparison} on pointers`, where);
            }
            const destination = allocate(ctx, builtinTypes.bool);
            emit(ctx, {
                kind: 'compare',
                comparison: e.comparison,
                lhs,
                rhs,
                destination,
                why: `${e.comparison}`,
            });
            return destination;
        }
        case 'not': {
            const source = lowerExpression(ctx, e.operand);
            const destination = allocate(ctx, builtinTypes.bool);
            emit(ctx, { kind: 'testZero', source, negated: false, destination, why: 'Logical not' });
            return destination;
        }
        case 'call': {
            const result = lowerCall(ctx, e);
            if (!result) return unsupported(ctx, 'using the result of a call that returns nothing', where);
            return result;
        }
        case 'index': {
            const { address, element } = arrayElementAddress(ctx, e.array, e.index, where);
            const destination = allocate(ctx, element);
            emit(ctx, { kind: 'load', address, destination, why: `Read ${e.array}[]` });
            return destination;
        }
        case 'addressOf': {
            const global = findGlobal(ctx, e.global);
            return globalAddress(ctx, global, global.type, `Address of ${e.global}`);
        }
        case 'dereference': {
            const type = resolveScalar(ctx, e.type, 'dereferenced value', where);
            const address = lowerExpression(ctx, e.pointer);
            const destination = allocate(ctx, type);
            emit(ctx, { kind: 'load', address, destination, why: 'Dereference' });
            return destination;
        }
        case 'convert': {
            const type = resolveScalar(ctx, e.type, 'conversion target', where);
            const from = lowerExpression(ctx, e.expression);
            if ((from.type.kind == 'Pointer') != (type.kind == 'Pointer')) {
                return unsupported(ctx, `conversion from ${typeToString(from.type)} to ${typeToString(type)}`, where);
            }
            const to = allocate(ctx, type);
            if (typesAreEqual(from.type, type)) {
                emit(ctx, { kind: 'move', from, to, why: 'Conversion to the same type' });
            } else {
                emit(ctx, {
                    kind: 'convert',
                    from,
                    to,
                    why: `${typeToString(from.type)} to ${typeToString(type)}`,
                });
            }
            return to;
        }
        case 'ternary': {
            const type = resolveScalar(ctx, e.type, 'conditional expression', where);
            const result = allocate(ctx, type);
            const elseLabel = ctx.makeLabel('ternary_else');
            const endLabel = ctx.makeLabel('ternary_end');
            const condition = lowerExpression(ctx, e.condition);
            emit(ctx, { kind: 'gotoIfFalse', condition, label: elseLabel, why: 'Ternary condition' });
            const ifTrue = lowerExpression(ctx, e.ifTrue);
            emit(ctx, { kind: 'move', from: ifTrue, to: result, why: 'Ternary true value' });
            emit(ctx, { kind: 'goto', label: endLabel, why: 'Skip false value' });
            emit(ctx, { kind: 'label', name: elseLabel, why: '' });
            const ifFalse = lowerExpression(ctx, e.ifFalse);
            emit(ctx, { kind: 'move', from: ifFalse, to: result, why: 'Ternary false value' });
            emit(ctx, { kind: 'label', name: endLabel, why: '' });
            return result;
        }
        default:
            return unsupported(ctx, `expression ${JSON.stringify(e)}`);
    }
};

const declareVariable = (ctx: FunctionContext, name: string, type: Type, where?: Ast.SourceLocation): Register => {
    const scalar = resolveScalar(ctx, type, `local ${name}`, where);
    const register = allocate(ctx, scalar);
    ctx.variables.set(name, register);
    ctx.locals.push({ name, type: scalar, register });
    return register;
};

// Names declared inside a block go out of scope at its end.
const lowerBlock = (ctx: FunctionContext, statements: Ast.Statement[]) => {
    const outer = new Map(ctx.variables);
    statements.forEach(s => lowerStatement(ctx, s));
    ctx.variables.clear();
    outer.forEach((register, name) => ctx.variables.set(name, register));
};

const lowerStatement = (ctx: FunctionContext, s: Ast.Statement): void => {
    const where = s.sourceLocation;
    switch (s.kind) {
        case 'declaration': {
            const value = s.initializer ? lowerExpression(ctx, s.initializer) : null;
            const home = declareVariable(ctx, s.name, s.type, where);
            if (value) {
                emit(ctx, { kind: 'move', from: value, to: home, why: `Initialize ${s.name}` });
            } else {
                emit(ctx, { kind: 'loadImmediate', value: 0, destination: home, why: `Zero ${s.name}` });
            }
            return;
        }
        case 'assignment': {
            const { target } = s;
            switch (target.kind) {
                case 'variable': {
                    const value = lowerExpression(ctx, s.expression);
                    const home = findVariable(ctx, target.name);
                    emit(ctx, { kind: 'move', from: value, to: home, why: `Assign ${target.name}` });
                    return;
                }
                case 'global': {
                    const global = findGlobal(ctx, target.name);
                    const type = resolveScalar(ctx, global.type, `global ${target.name}`, where);
                    const value = lowerExpression(ctx, s.expression);
                    const address = globalAddress(ctx, global, type, `Address of ${target.name}`);
                    emit(ctx, { kind: 'store', address, value, why: `Assign ${target.name}` });
                    return;
                }
                case 'index': {
                    const { address } = arrayElementAddress(ctx, target.array, target.index, where);
                    const value = lowerExpression(ctx, s.expression);
                    emit(ctx, { kind: 'store', address, value, why: `Assign ${target.array}[]` });
                    return;
                }
                case 'dereference': {
                    const address = lowerExpression(ctx, target.pointer);
                    const value = lowerExpression(ctx, s.expression);
                    emit(ctx, { kind: 'store', address, value, why: 'Assign through pointer' });
                    return;
                }
                default:
                    return unhandled(target, 'assignment target');
            }
        }
        case 'increment':
        case 'decrement': {
            const register = findVariable(ctx, s.name);
            if (!isNumeric(register.type)) {
                return unsupported(ctx, `${s.kind} of ${typeToString(register.type)}`, where);
            }
            emit(ctx, { kind: s.kind, register, why: `${s.name}${s.kind == 'increment' ? '++' : '--'}` });
            return;
        }
        case 'expression':
            if (s.expression.kind == 'call') {
                lowerCall(ctx, s.expression);
            } else {
                lowerExpression(ctx, s.expression);
            }
            return;
        case 'return':
            if (s.expression) {
                const register = lowerExpression(ctx, s.expression);
                emit(ctx, { kind: 'return', register, why: 'Return value' });
            } else {
                emit(ctx, { kind: 'return', register: null, why: 'Return' });
            }
            return;
        case 'if': {
            const elseLabel = ctx.makeLabel('else');
            const endLabel = ctx.makeLabel('end_if');
            const condition = lowerExpression(ctx, s.condition);
            emit(ctx, { kind: 'gotoIfFalse', condition, label: elseLabel, why: 'If condition' });
            lowerBlock(ctx, s.then);
            emit(ctx, { kind: 'goto', label: endLabel, why: 'End of then block' });
            emit(ctx, { kind: 'label', name: elseLabel, why: '' });
            lowerBlock(ctx, s.else || []);
            emit(ctx, { kind: 'label', name: endLabel, why: '' });
            return;
        }
        case 'while': {
            const headerLabel = ctx.makeLabel('while');
            const exitLabel = ctx.makeLabel('end_while');
            emit(ctx, { kind: 'label', name: headerLabel, why: '' });
            const condition = lowerExpression(ctx, s.condition);
            emit(ctx, { kind: 'gotoIfFalse', condition, label: exitLabel, why: 'Loop condition' });
            lowerBlock(ctx, s.body);
            emit(ctx, { kind: 'goto', label: headerLabel, why: 'Loop' });
            emit(ctx, { kind: 'label', name: exitLabel, why: '' });
            return;
        }
        case 'for': {
            const outer = new Map(ctx.variables);
            const from = lowerExpression(ctx, s.from);
            const limit = lowerExpression(ctx, s.to);
            const counter = declareVariable(ctx, s.variable, s.type, where);
            if (!isNumeric(counter.type) || !typesAreEqual(limit.type, counter.type)) {
                return unsupported(ctx, `for loop over ${typeToString(counter.type)}`, where);
            }
            emit(ctx, { kind: 'move', from, to: counter, why: `Initialize ${s.variable}` });
            const headerLabel = ctx.makeLabel('for');
            const exitLabel = ctx.makeLabel('end_for');
            emit(ctx, { kind: 'label', name: headerLabel, why: '' });
            const current = allocate(ctx, counter.type);
            emit(ctx, { kind: 'move', from: counter, to: current, why: `Read ${s.variable}` });
            const condition = allocate(ctx, builtinTypes.bool);
            emit(ctx, {
                kind: 'compare',
                comparison: '<',
                lhs: current,
                rhs: limit,
                destination: condition,
                why: `${s.variable} < limit`,
            });
            emit(ctx, { kind: 'gotoIfFalse', condition, label: exitLabel, why: 'Loop condition' });
            lowerBlock(ctx, s.body);
            emit(ctx, { kind: 'increment', register: counter, why: `${s.variable}++` });
            emit(ctx, { kind: 'goto', label: headerLabel, why: 'Loop' });
            emit(ctx, { kind: 'label', name: exitLabel, why: '' });
            ctx.variables.clear();
            outer.forEach((register, name) => ctx.variables.set(name, register));
            return;
        }
        default:
            return unsupported(ctx, `statement ${JSON.stringify(s)}`);
    }
};

const lowerFunction = (
    program: ProgramContext,
    declaration: Ast.FunctionDeclaration,
    symbol: FunctionSymbol,
    bindings: Map<string, Type>
): Function => {
    const ctx: FunctionContext = {
        program,
        declaration,
        symbolText: symbolToString(symbol),
        bindings,
        arena: new RegisterArena(),
        variables: new Map(),
        locals: [],
        instructions: [],
        makeLabel: idAppender(),
    };
    const parameters: Parameter[] = declaration.parameters.map(p => {
        const register = allocate(ctx, resolveScalar(ctx, p.type, `parameter ${p.name}`));
        ctx.variables.set(p.name, register);
        return { name: p.name, register };
    });
    const returnType = substitute(declaration.returnType, bindings);
    if (returnType.kind != 'Void') resolveScalar(ctx, returnType, 'return value');

    lowerBlock(ctx, declaration.body);

    const lastInstruction = ctx.instructions[ctx.instructions.length - 1];
    if (returnType.kind == 'Void' && (!lastInstruction || lastInstruction.kind != 'return')) {
        emit(ctx, { kind: 'return', register: null, why: 'Implicit return' });
    }

    return {
        symbol,
        parameters,
        returnType,
        locals: ctx.locals,
        registers: ctx.arena.registers,
        instructions: ctx.instructions,
        smcRequested: declaration.smc === true,
        isTailRecursive: false,
        convention: 'standard',
    };
};

const lowerGlobal = (module: string, g: Ast.GlobalDeclaration): GlobalVariable => {
    const { initializer } = g;
    if (typeof initializer == 'boolean') {
        return { module, name: g.name, type: g.type, initializer: initializer ? 1 : 0 };
    }
    return { module, name: g.name, type: g.type, initializer };
};

// Lower every non-generic function, then every instantiation they (transitively) request.
export const makeProgram = (module: Ast.Module, options: Pick<CompileOptions, 'instantiation'>): LoweringResult => {
    const program: ProgramContext = {
        module,
        strings: new StringPool(),
        globals: module.globals.map(g => lowerGlobal(module.name, g)),
        cache: new InstantiationCache(module.name, options.instantiation),
    };
    const errors: CompileError[] = [];
    let fatal = false;

    const lowerOrRecord = (
        declaration: Ast.FunctionDeclaration,
        symbol: FunctionSymbol,
        bindings: Map<string, Type>
    ): Function | null => {
        if (fatal) return null;
        try {
            return lowerFunction(program, declaration, symbol, bindings);
        } catch (e) {
            if (!(e instanceof LoweringFailure)) throw e;
            errors.push(e.error);
            if (e.error.kind == 'nonTerminatingInstantiation') {
                fatal = true;
                program.cache.clear();
            }
            return null;
        }
    };

    const functions: Function[] = [];
    module.functions
        .filter(f => f.typeParameters.length == 0)
        .forEach(declaration => {
            const lowered = lowerOrRecord(
                declaration,
                { module: module.name, name: declaration.name, mangling: [] },
                new Map()
            );
            if (lowered) functions.push(lowered);
        });
    program.cache.drain((instance: Instance) => lowerOrRecord(instance.template, instance.symbol, instance.bindings));

    if (errors.length > 0) return { errors };
    return {
        program: {
            module: module.name,
            functions: [...functions, ...program.cache.lowered],
            globals: program.globals,
            stringLiterals: program.strings.all,
        },
    };
};
