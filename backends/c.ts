import { file as tmpFile } from 'tmp-promise';
import { Program, GlobalVariable, StringLiteral, stringLiteralName } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { Register } from '../threeAddressCode/Register';
import { Statement, BinaryOperator, SymbolReference } from '../threeAddressCode/Statement';
import { FunctionSymbol, symbolToString } from '../threeAddressCode/FunctionSymbol';
import { allRuntimeFunctions } from '../threeAddressCode/runtime';
import { Backend, EmitOptions, EmitResult, ExecutionResult } from '../api';
import { targets } from '../TargetDescriptor';
import {
    Type,
    Scalar,
    shortName,
    valueBits,
    isSigned,
    fixedPointShift,
    one,
} from '../types';
import { Line, instruction, raw, linesToString, withWhy, emitEach, finish } from './shared';
import execAndGetResult from '../util/execAndGetResult';
import writeTempFile from '../util/writeTempFile';
import debug from '../util/debug';
import unhandled from '../util/never';
import join from '../util/join';

const descriptor = targets.c99;

// C has no '.' in identifiers, so Module.name becomes Module_name.
export const cGlobalName = ({ module, name }: { module: string; name: string }): string => `${module}_${name}`;

const cType = (type: Type): string => {
    switch (type.kind) {
        case 'Integer':
        case 'FixedPoint':
            return shortName(type);
        case 'Boolean':
            return 'u8';
        case 'Void':
            return 'void';
        case 'String':
            return 'String';
        case 'Pointer':
            // Pointers to arrays point at their first element, like a decayed C array.
            if (type.to.kind == 'Array') return `${cType(type.to.of)} *`;
            if (type.to.kind == 'String') return 'const String *';
            return `${cType(type.to)} *`;
        case 'Array':
            throw debug('arrays have no C value type');
        case 'TypeParameter':
            throw debug(`unsubstituted type parameter ${type.name}`);
        default:
            return unhandled(type, 'cType');
    }
};

const r = (register: Register): string => `r${register.id}`;

// Cast an unsigned 32 bit computation back into the register's type, wrapping at its width.
const wrapTo = (type: Scalar, expression: string): string => {
    if (type.kind == 'Boolean') return `(u8)((${expression}) != 0)`;
    if (type.kind == 'Pointer') return `(${cType(type)})(${expression})`;
    if (valueBits(type) == 24) return isSigned(type) ? `WRAP_I24(${expression})` : `WRAP_U24(${expression})`;
    return `(${cType(type)})(${expression})`;
};

const unsignedOperator: { [O in BinaryOperator]?: string } = {
    add: '+',
    subtract: '-',
    multiply: '*',
    and: '&',
    or: '|',
    xor: '^',
};

const binaryOperation = (operator: BinaryOperator, type: Scalar, lhs: string, rhs: string): string => {
    const bits = valueBits(type);
    if (bits === null) throw debug('arithmetic on a pointer');
    const shift = type.kind == 'FixedPoint' ? fixedPointShift(type) : 0;
    if (type.kind == 'FixedPoint' && operator == 'multiply') {
        return wrapTo(type, `((int64_t)${lhs} * ${rhs}) >> ${shift}`);
    }
    if (type.kind == 'FixedPoint' && operator == 'divide') {
        return wrapTo(type, `((int64_t)${lhs} * ${2 ** shift}) / ${rhs}`);
    }
    const plain = unsignedOperator[operator];
    if (plain) return wrapTo(type, `(u32)${lhs} ${plain} (u32)${rhs}`);
    switch (operator) {
        // INT32_MIN / -1 overflows int and traps; negate in unsigned arithmetic instead.
        case 'divide':
            if (isSigned(type) && bits == 32) {
                return `${rhs} == -1 ? ${wrapTo(type, `0u - (u32)${lhs}`)} : ${wrapTo(type, `${lhs} / ${rhs}`)}`;
            }
            return wrapTo(type, `${lhs} / ${rhs}`);
        case 'modulo':
            if (isSigned(type) && bits == 32) return `${rhs} == -1 ? 0 : ${wrapTo(type, `${lhs} % ${rhs}`)}`;
            return wrapTo(type, `${lhs} % ${rhs}`);
        case 'shiftLeft':
            return `(u32)${rhs} >= ${bits} ? 0 : ${wrapTo(type, `(u32)${lhs} << ${rhs}`)}`;
        case 'shiftRight': {
            const outOfRange = isSigned(type) ? `(${lhs} < 0 ? -1 : 0)` : '0';
            return `(u32)${rhs} >= ${bits} ? ${outOfRange} : ${wrapTo(type, `${lhs} >> ${rhs}`)}`;
        }
        default:
            throw debug(`operator ${operator} should have been handled`);
    }
};

const conversion = (from: Scalar, to: Scalar, value: string): string => {
    if (to.kind == 'Boolean') return `(${value} != 0)`;
    if (to.kind == 'Pointer' || from.kind == 'Pointer') return `(${cType(to)})${value}`;
    const fromShift = from.kind == 'FixedPoint' ? fixedPointShift(from) : 0;
    const toShift = to.kind == 'FixedPoint' ? fixedPointShift(to) : 0;
    if (toShift > fromShift) return wrapTo(to, `(int64_t)${value} * ${2 ** (toShift - fromShift)}`);
    // Arithmetic shift rounds towards negative infinity
    if (toShift < fromShift) return wrapTo(to, `(int64_t)${value} >> ${fromShift - toShift}`);
    return wrapTo(to, value);
};

const symbolAddress = (symbol: SymbolReference, program: Program): string => {
    if (symbol.kind == 'string') return `&${stringLiteralName(symbol)}`;
    const global = program.globals.find(g => g.module == symbol.module && g.name == symbol.name);
    if (!global) throw debug(`address of missing global ${symbol.name}`);
    return global.type.kind == 'Array' ? cGlobalName(symbol) : `&${cGlobalName(symbol)}`;
};

const callName = (symbol: FunctionSymbol): string => symbolToString(symbol);

const statementToC = (tas: Statement, program: Program): Line[] => {
    switch (tas.kind) {
        case 'loadImmediate':
            return [instruction(`${r(tas.destination)} = ${tas.value};`)];
        case 'move':
            return [instruction(`${r(tas.to)} = ${r(tas.from)};`)];
        case 'binaryOperation':
            return [
                instruction(
                    `${r(tas.destination)} = ${binaryOperation(
                        tas.operator,
                        tas.destination.type,
                        r(tas.lhs),
                        r(tas.rhs)
                    )};`
                ),
            ];
        case 'compare':
            return [instruction(`${r(tas.destination)} = ${r(tas.lhs)} ${tas.comparison} ${r(tas.rhs)};`)];
        case 'testZero':
            return [instruction(`${r(tas.destination)} = ${r(tas.source)} ${tas.negated ? '!=' : '=='} 0;`)];
        case 'convert':
            return [instruction(`${r(tas.to)} = ${conversion(tas.from.type, tas.to.type, r(tas.from))};`)];
        case 'increment':
        case 'decrement': {
            const type = tas.register.type;
            if (type.kind != 'Integer' && type.kind != 'FixedPoint') throw debug(`${tas.kind} of ${shortName(type)}`);
            const operator = tas.kind == 'increment' ? '+' : '-';
            return [
                instruction(`${r(tas.register)} = ${wrapTo(type, `(u32)${r(tas.register)} ${operator} ${one(type)}u`)};`),
            ];
        }
        case 'label':
            return [raw(`${tas.name}:;`)];
        case 'goto':
            return [instruction(`goto ${tas.label};`)];
        case 'gotoIfFalse':
            return [instruction(`if (!${r(tas.condition)}) goto ${tas.label};`)];
        case 'call': {
            const name = tas.target.kind == 'runtime' ? tas.target.name : callName(tas.target.symbol);
            const call = `${name}(${join(tas.arguments.map(r), ', ')});`;
            return [instruction(tas.destination ? `${r(tas.destination)} = ${call}` : call)];
        }
        case 'return':
            return [instruction(tas.register ? `return ${r(tas.register)};` : 'return;')];
        case 'addressOf':
            return [instruction(`${r(tas.destination)} = ${symbolAddress(tas.symbol, program)};`)];
        case 'arrayIndex':
            return [instruction(`${r(tas.destination)} = ${r(tas.base)} + ${r(tas.index)};`)];
        case 'load':
            return [instruction(`${r(tas.destination)} = *${r(tas.address)};`)];
        case 'store':
            return [instruction(`*${r(tas.address)} = ${r(tas.value)};`)];
        default:
            return unhandled(tas, 'statementToC');
    }
};

const signature = (f: Function, parameterName: (index: number) => string): string => {
    const parameters = f.parameters.map((p, i) => `${cType(p.register.type)} ${parameterName(i)}`);
    return `${cType(f.returnType)} ${callName(f.symbol)}(${parameters.length > 0 ? join(parameters, ', ') : 'void'})`;
};

const prototype = (f: Function): string => `${signature(f, i => f.parameters[i].name)};`;

const functionToC = (f: Function, program: Program, options: EmitOptions): string => {
    const parameterIds = new Set(f.parameters.map(p => p.register.id));
    const declarations = f.registers
        .filter(register => !parameterIds.has(register.id))
        .map(register => instruction(`${cType(register.type)} ${r(register)};`));
    const body = f.instructions.map(tas => withWhy(statementToC(tas, program), tas)).flat();
    return linesToString(
        [
            raw(`${signature(f, i => r(f.parameters[i].register))} {`),
            ...declarations,
            ...body,
            raw('}'),
        ],
        descriptor,
        options
    );
};

const initializerToC = (g: GlobalVariable): string => {
    const { initializer } = g;
    if (initializer === undefined) return '';
    if (Array.isArray(initializer)) return ` = {${join(initializer.map(v => `${v}`), ', ')}}`;
    return ` = ${initializer}`;
};

const globalToC = (g: GlobalVariable): string => {
    const name = cGlobalName(g);
    if (g.type.kind == 'Array') return `static ${cType(g.type.of)} ${name}[${g.type.length}]${initializerToC(g)};`;
    return `static ${cType(g.type)} ${name}${initializerToC(g)};`;
};

const stringLiteralToC = (literal: StringLiteral): string => {
    const name = stringLiteralName(literal);
    const bytes = [...Array.from(literal.value).map(c => `${c.charCodeAt(0)}`), '0'];
    return join(
        [
            `static const u8 ${name}_data[] = {${join(bytes, ', ')}};`,
            `static const String ${name} = {${literal.value.length}, ${name}_data};`,
        ],
        '\n'
    );
};

const printFunctions = join(
    allRuntimeFunctions.map(({ name }) => {
        switch (name) {
            case 'print_char':
                return 'static void print_char(u8 c) { putchar(c); }';
            case 'print_u8':
            case 'print_u16':
            case 'print_u24':
            case 'print_u32': {
                const type = name.replace('print_', '');
                return `static void ${name}(${type} v) { printf("%lu", (unsigned long)v); }`;
            }
            case 'print_i8':
            case 'print_i16':
            case 'print_i24':
            case 'print_i32': {
                const type = name.replace('print_', '');
                return `static void ${name}(${type} v) { printf("%ld", (long)v); }`;
            }
            case 'print_bool':
                return 'static void print_bool(u8 v) { fputs(v ? "true" : "false", stdout); }';
            case 'print_newline':
                return "static void print_newline(void) { putchar('\\n'); }";
            case 'print_string':
                return 'static void print_string(const String *s) { fwrite(s->data, 1, s->len, stdout); }';
            default:
                return unhandled(name, 'printFunctions');
        }
    }),
    '\n'
);

const prologue = (module: string) => `// Module ${module}, generated for ${descriptor.description}
#include <stdint.h>
#include <stdio.h>

typedef uint8_t u8;
typedef uint16_t u16;
typedef uint32_t u24;
typedef uint32_t u32;
typedef int8_t i8;
typedef int16_t i16;
typedef int32_t i24;
typedef int32_t i32;

// Fixed point values are stored scaled by 2^shift
typedef int16_t f8_8;
typedef int8_t f_8;
typedef int16_t f_16;
typedef int32_t f16_8;
typedef int32_t f8_16;

#define WRAP_U24(x) ((u24)((u32)(x) & 0xFFFFFFu))
#define WRAP_I24(x) ((i24)((u32)(x) << 8) >> 8)

typedef struct {
    u16 len;
    const u8 *data;
} String;

${printFunctions}`;

const emit = (program: Program, options: EmitOptions): EmitResult =>
    finish(
        emitEach(program, descriptor, f => functionToC(f, program, options)),
        functions => {
            const hasMain = program.functions.some(
                f => f.symbol.name == 'main' && f.symbol.mangling.length == 0 && f.parameters.length == 0
            );
            const sections = [
                prologue(program.module),
                '// Globals',
                ...program.globals.map(globalToC),
                '// String literals',
                ...program.stringLiterals.map(stringLiteralToC),
                '// Function declarations',
                ...program.functions.map(prototype),
                ...functions,
            ];
            if (hasMain) {
                sections.push(`int main(void) {\n    ${program.module}_main();\n    return 0;\n}`);
            }
            return `${join(sections, '\n\n')}\n`;
        }
    );

// Compile and run as separate steps: the binary can't be executed while a descriptor for it is still open.
const execute = async (output: string, programName: string): Promise<ExecutionResult> => {
    const sourceFile = await writeTempFile(output, programName, 'c');
    const binaryFile = await tmpFile({ template: `${programName}-XXXXXX`, discardDescriptor: true });
    try {
        const compilation = await execAndGetResult(
            'cc',
            `cc -std=gnu99 -w ${sourceFile.path} -o ${binaryFile.path}`
        );
        if ('error' in compilation) return compilation;
        if (compilation.exitCode != 0) {
            return { error: `cc exited with ${compilation.exitCode}`, executorName: 'cc' };
        }
        return await execAndGetResult('cc', binaryFile.path);
    } finally {
        await sourceFile.cleanup();
        await binaryFile.cleanup();
    }
};

const cBackend: Backend = {
    descriptor,
    emit,
    executors: [{ name: 'cc', execute }],
};
export default cBackend;
