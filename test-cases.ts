import {
    Module,
    FunctionDeclaration,
    BinaryOperator,
    Expression,
    num,
    str,
    id,
    global,
    binary,
    compare,
    call,
    callGeneric,
    callRuntime,
    ret,
    assign,
    local,
    ifThen,
} from './ast';
import { Type, builtinTypes, typeParameter, pointerTo } from './types';

const { u8, u16, i32, bool } = builtinTypes;
const T = typeParameter('T');

export type TestCase = {
    name: string;
    module: Module;
    // Function the interpreter runs, main if absent
    entry?: { name: string; mangling: Type[]; args: number[] };
    // Expected return value (null for void) and captured output
    value?: number | null;
    stdout?: string;
};

export const fibonacci: Module = {
    name: 'Fib',
    globals: [],
    functions: [
        {
            name: 'fib_tail',
            typeParameters: ['T'],
            parameters: [
                { name: 'n', type: T },
                { name: 'a', type: T },
                { name: 'b', type: T },
            ],
            returnType: T,
            smc: true,
            body: [
                ifThen(compare('==', id('n', T), num(0, T)), [ret(id('a', T))]),
                ret(
                    callGeneric(
                        'fib_tail',
                        [T],
                        [binary('-', id('n', T), num(1, T)), id('b', T), binary('+', id('a', T), id('b', T))],
                        T
                    )
                ),
            ],
        },
        {
            name: 'fibonacci',
            typeParameters: [],
            parameters: [{ name: 'n', type: u16 }],
            returnType: u16,
            body: [ret(callGeneric('fib_tail', [u16], [id('n', u16), num(0, u16), num(1, u16)], u16))],
        },
    ],
};

export const factorial: Module = {
    name: 'Fact',
    globals: [],
    functions: [
        {
            name: 'factorial',
            typeParameters: [],
            parameters: [{ name: 'n', type: u8 }],
            returnType: u8,
            body: [
                ifThen(compare('<=', id('n', u8), num(1, u8)), [ret(num(1, u8))]),
                ret(binary('*', id('n', u8), call('factorial', [binary('-', id('n', u8), num(1, u8))], u8))),
            ],
        },
    ],
};

export const smcAdd: Module = {
    name: 'Smc',
    globals: [],
    functions: [
        {
            name: 'add_smc',
            typeParameters: [],
            parameters: [
                { name: 'a', type: u16 },
                { name: 'b', type: u16 },
            ],
            returnType: u16,
            smc: true,
            body: [ret(binary('+', id('a', u16), id('b', u16)))],
        },
        {
            name: 'main',
            typeParameters: [],
            parameters: [],
            returnType: builtinTypes.void,
            body: [callRuntime('print_u16', [call('add_smc', [num(40, u16), num(2, u16)], u16)])],
        },
    ],
};

// Every iteration patches and calls an SMC function.
export const loop: Module = {
    name: 'Loop',
    globals: [],
    functions: [
        {
            name: 'add_smc',
            typeParameters: [],
            parameters: [
                { name: 'a', type: u8 },
                { name: 'b', type: u8 },
            ],
            returnType: u8,
            smc: true,
            body: [ret(binary('+', id('a', u8), id('b', u8)))],
        },
        {
            name: 'loop_test',
            typeParameters: [],
            parameters: [{ name: 'n', type: u8 }],
            returnType: u8,
            body: [
                local('total', u8, num(0, u8)),
                {
                    kind: 'for',
                    variable: 'i',
                    type: u8,
                    from: num(0, u8),
                    to: id('n', u8),
                    body: [assign('total', call('add_smc', [id('total', u8), id('i', u8)], u8))],
                },
                ret(id('total', u8)),
            ],
        },
    ],
};

// The self-call rotates its parameters, so each new value reads a parameter that is also being replaced.
export const rotate: Module = {
    name: 'Rot',
    globals: [],
    functions: [
        {
            name: 'rot',
            typeParameters: [],
            parameters: [
                { name: 'a', type: u8 },
                { name: 'b', type: u8 },
                { name: 'c', type: u8 },
                { name: 'n', type: u8 },
            ],
            returnType: u8,
            body: [
                ifThen(compare('==', id('n', u8), num(0, u8)), [ret(id('a', u8))]),
                ret(
                    call(
                        'rot',
                        [id('b', u8), id('c', u8), id('a', u8), binary('-', id('n', u8), num(1, u8))],
                        u8
                    )
                ),
            ],
        },
    ],
};

export const bits: Module = {
    name: 'Bits',
    globals: [],
    functions: [
        {
            name: 'is_even',
            typeParameters: [],
            parameters: [{ name: 'n', type: u8 }],
            returnType: bool,
            body: [ret(compare('==', binary('&', id('n', u8), num(1, u8)), num(0, u8)))],
        },
    ],
};

export const hello: Module = {
    name: 'Hello',
    globals: [],
    functions: [
        {
            name: 'main',
            typeParameters: [],
            parameters: [],
            returnType: builtinTypes.void,
            body: [callRuntime('print_string', [str('Hello')]), callRuntime('print_newline', [])],
        },
    ],
};

export const counter: Module = {
    name: 'Counter',
    globals: [{ name: 'count', type: u8, initializer: 5 }],
    functions: [
        {
            name: 'bump',
            typeParameters: [],
            parameters: [],
            returnType: u8,
            body: [
                {
                    kind: 'assignment',
                    target: { kind: 'global', name: 'count' },
                    expression: binary('+', global('count', u8), num(1, u8)),
                },
                ret(global('count', u8)),
            ],
        },
        {
            name: 'main',
            typeParameters: [],
            parameters: [],
            returnType: builtinTypes.void,
            body: [
                callRuntime('print_u8', [call('bump', [], u8)]),
                callRuntime('print_u8', [call('bump', [], u8)]),
            ],
        },
    ],
};

const ternaryMax = (type: Type): Expression => ({
    kind: 'ternary',
    condition: compare('>', id('a', type), id('b', type)),
    ifTrue: id('a', type),
    ifFalse: id('b', type),
    type,
});

export const generic: Module = {
    name: 'Generic',
    globals: [],
    functions: [
        {
            name: 'max',
            typeParameters: ['T'],
            parameters: [
                { name: 'a', type: T },
                { name: 'b', type: T },
            ],
            returnType: T,
            body: [ret(ternaryMax(T))],
        },
        {
            name: 'main',
            typeParameters: [],
            parameters: [],
            returnType: builtinTypes.void,
            body: [
                callRuntime('print_u8', [callGeneric('max', [u8], [num(3, u8), num(9, u8)], u8)]),
                callRuntime('print_u8', [callGeneric('max', [u8], [num(7, u8), num(2, u8)], u8)]),
                callRuntime('print_u16', [callGeneric('max', [u16], [num(300, u16), num(20, u16)], u16)]),
            ],
        },
    ],
};

export const testCases: TestCase[] = [
    { name: 'fibonacci', module: fibonacci, entry: { name: 'fibonacci', mangling: [], args: [10] }, value: 55 },
    { name: 'factorial', module: factorial, entry: { name: 'factorial', mangling: [], args: [6] }, value: 208 },
    { name: 'smc_add', module: smcAdd, value: null, stdout: '42' },
    { name: 'loop_test', module: loop, entry: { name: 'loop_test', mangling: [], args: [10] }, value: 45 },
    { name: 'rotate', module: rotate, entry: { name: 'rot', mangling: [], args: [1, 2, 3, 4] }, value: 2 },
    { name: 'is_even_4', module: bits, entry: { name: 'is_even', mangling: [], args: [4] }, value: 1 },
    { name: 'is_even_7', module: bits, entry: { name: 'is_even', mangling: [], args: [7] }, value: 0 },
    { name: 'hello', module: hello, value: null, stdout: 'Hello\n' },
    { name: 'global_counter', module: counter, value: null, stdout: '67' },
    { name: 'generic_max', module: generic, value: null, stdout: '97300' },
];

// Programs the pipeline must reject.

// Recursive, but not in tail position, so it can never use self-modifying parameter slots.
export const smcConflict: Module = {
    name: 'Conflict',
    globals: [],
    functions: [
        {
            name: 'sum_to',
            typeParameters: [],
            parameters: [{ name: 'n', type: u8 }],
            returnType: u8,
            smc: true,
            body: [
                ifThen(compare('==', id('n', u8), num(0, u8)), [ret(num(0, u8))]),
                ret(binary('+', id('n', u8), call('sum_to', [binary('-', id('n', u8), num(1, u8))], u8))),
            ],
        },
    ],
};

// Every instance asks for one with a deeper pointer type.
export const unboundedInstantiation: Module = {
    name: 'Grow',
    globals: [],
    functions: [
        {
            name: 'grow',
            typeParameters: ['T'],
            parameters: [{ name: 'x', type: u8 }],
            returnType: u8,
            body: [ret(callGeneric('grow', [pointerTo(T)], [id('x', u8)], u8))],
        },
        {
            name: 'main',
            typeParameters: [],
            parameters: [],
            returnType: builtinTypes.void,
            body: [callRuntime('print_u8', [callGeneric('grow', [u8], [num(1, u8)], u8)])],
        },
    ],
};

export const unsupportedOperator: Module = {
    name: 'Bad',
    globals: [],
    functions: [
        {
            name: 'bad',
            typeParameters: [],
            parameters: [{ name: 'a', type: u8 }],
            returnType: u8,
            body: [
                ret({
                    kind: 'binaryOperation',
                    operator: '**',
                    lhs: id('a', u8),
                    rhs: num(2, u8),
                    type: u8,
                    sourceLocation: { line: 3, column: 12 },
                }),
            ],
        },
    ],
};

export const division: Module = {
    name: 'Div',
    globals: [],
    functions: [
        {
            name: 'divide',
            typeParameters: [],
            parameters: [
                { name: 'a', type: u8 },
                { name: 'b', type: u8 },
            ],
            returnType: u8,
            body: [ret(binary('/', id('a', u8), id('b', u8)))],
        },
    ],
};

const signedBinary = (name: string, operator: BinaryOperator): FunctionDeclaration => ({
    name,
    typeParameters: [],
    parameters: [
        { name: 'a', type: i32 },
        { name: 'b', type: i32 },
    ],
    returnType: i32,
    body: [ret(binary(operator, id('a', i32), id('b', i32)))],
});

export const signedDivision: Module = {
    name: 'SDiv',
    globals: [],
    functions: [signedBinary('divide_i32', '/'), signedBinary('modulo_i32', '%')],
};
