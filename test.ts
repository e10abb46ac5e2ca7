import test from 'ava';
import {
    testCases,
    TestCase,
    fibonacci,
    smcAdd,
    loop,
    rotate,
    factorial,
    generic,
    smcConflict,
    unboundedInstantiation,
    unsupportedOperator,
    division,
    signedDivision,
} from './test-cases';
import compile, { CompileResult } from './compiler';
import { makeProgram } from './threeAddressCode/generator';
import { Program, findFunction } from './threeAddressCode/Program';
import { Function } from './threeAddressCode/Function';
import { FunctionSymbol, symbolToString } from './threeAddressCode/FunctionSymbol';
import { Statement, mapRegisters } from './threeAddressCode/Statement';
import { Register } from './threeAddressCode/Register';
import { interpretFunction, interpretProgram, evaluateBinaryOperation, evaluateConversion } from './interpreter';
import { peepholeWithTrace } from './optimizer/peephole';
import { optimizeFunction } from './optimizer/pipeline';
import convertTailCalls, { isTailRecursive } from './optimizer/tailCall';
import { controlFlowGraph } from './controlFlowGraph';
import { emit, requiredFeatures } from './backend-utils';
import { smcSlots } from './backends/z80';
import { llType } from './backends/ssa';
import cBackend from './backends/c';
import execAndGetResult from './util/execAndGetResult';
import { toString as errorToString } from './CompileError';
import { resolveOptions, defaultCompileOptions } from './options';
import { targetNames, isTargetName } from './TargetDescriptor';
import { builtinTypes, fixed, pointerTo, arrayOf, nestingDepth, shortName, wrap, Type } from './types';
import { Module } from './ast';

const { u8, u16, i16, i32 } = builtinTypes;

const lower = (module: Module): Program => {
    const result = makeProgram(module, defaultCompileOptions);
    if ('errors' in result) throw new Error(`lowering ${module.name} failed: ${result.errors.map(errorToString).join('; ')}`);
    return result.program;
};

const compiled = (result: CompileResult): { program: Program; output: string } => {
    if ('errors' in result) throw new Error(result.errors.map(errorToString).join('; '));
    return result;
};

const lines = (output: string): string[] => output.split('\n');

const functionNamed = (program: Program, name: string): Function => {
    const f = program.functions.find(candidate => candidate.symbol.name == name);
    if (!f) throw new Error(`no function ${name}`);
    return f;
};

const run = (program: Program, testCase: TestCase) => {
    if (!testCase.entry) return interpretProgram(program);
    const { name, mangling, args } = testCase.entry;
    return interpretFunction(program, { module: program.module, name, mangling }, args);
};

testCases.forEach(testCase => {
    test(`${testCase.name} runs in the interpreter`, t => {
        const result = run(lower(testCase.module), testCase);
        if ('error' in result) return t.fail(result.error);
        if (testCase.value !== undefined) t.deepEqual(result.value, testCase.value);
        if (testCase.stdout !== undefined) t.is(result.stdout, testCase.stdout);
    });

    targetNames.forEach(target => {
        test(`${testCase.name} keeps its meaning after optimizing for ${target}`, t => {
            const reference = run(lower(testCase.module), testCase);
            const optimized = run(compiled(compile(testCase.module, { target, comments: false })).program, testCase);
            if ('error' in optimized || 'error' in reference) return t.fail('interpreter failed');
            t.deepEqual(optimized.value, reference.value);
            t.is(optimized.stdout, reference.stdout);
        });
    });

    test(`${testCase.name} runs as C`, async (t): Promise<boolean | void> => {
        const toolchain = await execAndGetResult('cc', 'cc --version');
        if ('error' in toolchain || toolchain.exitCode != 0) return t.pass('cc is not installed');
        const { program, output } = compiled(compile(testCase.module, { target: 'c99', comments: false }));
        const reference = run(program, testCase);
        if ('error' in reference) return t.fail(reference.error);
        let source = output;
        if (testCase.entry) {
            const { name, mangling, args } = testCase.entry;
            const entry = symbolToString({ module: program.module, name, mangling });
            source = `${output}\nint main(void) {\n    return ${entry}(${args.join(', ')});\n}\n`;
        }
        const result = await cBackend.executors[0].execute(source, testCase.name);
        if ('error' in result) return t.fail(result.error);
        t.is(result.exitCode, typeof reference.value == 'number' ? reference.value : 0);
        t.is(result.stdout, reference.stdout);
    });
});

test('fixed point and wrapping arithmetic', t => {
    t.is(evaluateBinaryOperation('add', u8, 250, 10), 4);
    t.is(evaluateBinaryOperation('subtract', u8, 3, 5), 254);
    t.is(evaluateBinaryOperation('multiply', fixed('f8.8'), 384, 512), 768);
    t.is(evaluateConversion(768, fixed('f8.8'), u8), 3);
    t.is(wrap(40000, i16), 40000 - 65536);
    t.is(evaluateBinaryOperation('shiftLeft', u8, 1, 8), 0);
    t.is(evaluateBinaryOperation('divide', i32, -2147483648, -1), -2147483648);
    t.is(evaluateBinaryOperation('modulo', i32, -2147483648, -1), 0);
    t.is(evaluateBinaryOperation('divide', i16, -1, 2), 0);
});

test('signed 32 bit division by -1 is guarded in C', t => {
    const { program, output } = compiled(compile(signedDivision, { target: 'c99', comments: false }));
    const [divide, modulo] = ['divide', 'modulo'].map(operator => {
        const tas = functionNamed(program, `${operator}_i32`).instructions.find(s => s.kind == 'binaryOperation');
        if (!tas || tas.kind != 'binaryOperation') throw new Error(`no ${operator} in ${operator}_i32`);
        return tas;
    });
    const [d, dl, dr] = [divide.destination.id, divide.lhs.id, divide.rhs.id];
    const [m, ml, mr] = [modulo.destination.id, modulo.lhs.id, modulo.rhs.id];
    const text = lines(output);
    t.true(text.includes(`    r${d} = r${dr} == -1 ? (i32)(0u - (u32)r${dl}) : (i32)(r${dl} / r${dr});`));
    t.true(text.includes(`    r${m} = r${mr} == -1 ? 0 : (i32)(r${ml} % r${mr});`));
});

test('division by zero is a runtime error', t => {
    const program = lower(division);
    const result = interpretFunction(program, { module: 'Div', name: 'divide', mangling: [] }, [1, 0]);
    t.true('error' in result);
    const quotient = interpretFunction(program, { module: 'Div', name: 'divide', mangling: [] }, [9, 2]);
    if ('error' in quotient) return t.fail(quotient.error);
    t.is(quotient.value, 4);
});

test('type names', t => {
    t.is(shortName(u8), 'u8');
    t.is(shortName(fixed('f8.8')), 'f8_8');
    t.is(shortName(pointerTo(u8)), 'p_u8');
    t.is(shortName(arrayOf(u16, 10)), 'a10_u16');
    t.is(llType(fixed('f8.8')), 'i16');
    t.is(llType(builtinTypes.bool), 'i1');
});

test('options merge with defaults', t => {
    const options = resolveOptions({ target: 'm68k', optimize: { tailCalls: false } });
    t.deepEqual(options.optimize, { peephole: true, tailCalls: false });
    t.is(options.target, 'm68k');
    t.is(options.instantiation.maxTypeDepth, 8);
    t.true(isTargetName('z80-smc'));
    t.false(isTargetName('x64'));
});

test('generic instances are cached and mangled with their types', t => {
    const program = lower(generic);
    t.deepEqual(program.functions.map(f => symbolToString(f.symbol)), [
        'Generic_main',
        'Generic_max$u8$u8',
        'Generic_max$u16$u16',
    ]);
});

test('unbounded instantiation is rejected', t => {
    const result = makeProgram(unboundedInstantiation, defaultCompileOptions);
    if (!('errors' in result)) return t.fail('expected instantiation to fail');
    t.is(result.errors.length, 1);
    const [error] = result.errors;
    if (error.kind != 'nonTerminatingInstantiation') return t.fail(errorToString(error));
    t.is(error.template, 'grow');
    t.is(nestingDepth(error.typeArguments[0]), 9);
});

test('unsupported operators are reported where they appear', t => {
    const result = compile(unsupportedOperator);
    if (!('errors' in result)) return t.fail('expected compilation to fail');
    t.deepEqual(result.errors, [
        {
            kind: 'unsupportedOperation',
            function: 'Bad_bad',
            construct: 'operator **',
            sourceLocation: { line: 3, column: 12 },
        },
    ]);
    t.is(errorToString(result.errors[0]), 'Unsupported operation in Bad_bad at line 3, column 12: operator **');
});

const fibTail: FunctionSymbol = { module: 'Fib', name: 'fib_tail', mangling: [u16, u16, u16] };

test('tail recursion becomes a loop', t => {
    const unoptimized = interpretFunction(lower(fibonacci), fibTail, [10, 0, 1]);
    if ('error' in unoptimized) return t.fail(unoptimized.error);
    t.is(unoptimized.value, 55);
    t.is(unoptimized.maxCallDepth, 11);

    const program = compiled(compile(fibonacci, { target: 'c99' })).program;
    const f = functionNamed(program, 'fib_tail');
    t.true(f.isTailRecursive);
    t.false(f.instructions.some(tas => tas.kind == 'call'));
    const optimized = interpretFunction(program, fibTail, [10, 0, 1]);
    if ('error' in optimized) return t.fail(optimized.error);
    t.is(optimized.value, 55);
    t.is(optimized.maxCallDepth, 1);
});

test('tail calls agree with recursion for every count', t => {
    const rot: FunctionSymbol = { module: 'Rot', name: 'rot', mangling: [] };
    const pairs: [Program, Program, FunctionSymbol, (n: number) => number[]][] = [
        [lower(fibonacci), compiled(compile(fibonacci, { target: 'c99' })).program, fibTail, n => [n, 0, 1]],
        [lower(rotate), compiled(compile(rotate, { target: 'c99' })).program, rot, n => [1, 2, 3, n]],
    ];
    pairs.forEach(([raw, optimized, symbol, args]) => {
        t.true(functionNamed(optimized, symbol.name).isTailRecursive);
        for (let n = 0; n <= 24; n++) {
            const before = interpretFunction(raw, symbol, args(n));
            const after = interpretFunction(optimized, symbol, args(n));
            if ('error' in before || 'error' in after) return t.fail(`${symbol.name}(${args(n).join(', ')}) failed`);
            t.is(after.value, before.value);
            t.is(before.maxCallDepth, n + 1);
            t.is(after.maxCallDepth, 1);
        }
    });
    const rotated = interpretFunction(lower(rotate), rot, [1, 2, 3, 7]);
    if ('error' in rotated) return t.fail(rotated.error);
    t.is(rotated.value, 2);
});

test('rebinding parameters saves the ones later arguments still read', t => {
    const [a, b, c, n] = [1, 2, 3, 4].map((id): Register => ({ id, type: u8 }));
    const isZero: Register = { id: 5, type: builtinTypes.bool };
    const one: Register = { id: 6, type: u8 };
    const next: Register = { id: 7, type: u8 };
    const result: Register = { id: 8, type: u8 };
    const symbol: FunctionSymbol = { module: 'Rot', name: 'rot', mangling: [] };
    const f: Function = {
        symbol,
        parameters: [
            { name: 'a', register: a },
            { name: 'b', register: b },
            { name: 'c', register: c },
            { name: 'n', register: n },
        ],
        returnType: u8,
        locals: [],
        registers: [a, b, c, n, isZero, one, next, result],
        instructions: [
            { kind: 'testZero', source: n, negated: false, destination: isZero, why: 'n == 0' },
            { kind: 'gotoIfFalse', condition: isZero, label: 'recurse', why: '' },
            { kind: 'return', register: a, why: '' },
            { kind: 'label', name: 'recurse', why: '' },
            { kind: 'loadImmediate', value: 1, destination: one, why: '' },
            { kind: 'binaryOperation', operator: 'subtract', lhs: n, rhs: one, destination: next, why: 'n - 1' },
            { kind: 'call', target: { kind: 'function', symbol }, arguments: [b, c, a, next], destination: result, why: '' },
            { kind: 'return', register: result, why: '' },
        ],
        smcRequested: false,
        isTailRecursive: true,
        convention: 'standard',
    };
    const converted = convertTailCalls(f);
    t.false(converted.instructions.some(tas => tas.kind == 'call'));
    t.is(converted.instructions.filter(tas => tas.kind == 'move' && tas.why == 'Save old parameter value').length, 3);

    const program = (fn: Function): Program => ({ module: 'Rot', functions: [fn], globals: [], stringLiterals: [] });
    for (let count = 0; count <= 24; count++) {
        const before = interpretFunction(program(f), symbol, [1, 2, 3, count]);
        const after = interpretFunction(program(converted), symbol, [1, 2, 3, count]);
        if ('error' in before || 'error' in after) return t.fail(`rot(1, 2, 3, ${count}) failed`);
        t.is(before.value, (count % 3) + 1);
        t.is(after.value, before.value);
        t.is(after.maxCallDepth, 1);
    }
});

test('non-tail recursion is left alone', t => {
    const f = optimizeFunction(functionNamed(lower(factorial), 'factorial'), defaultCompileOptions);
    t.false(isTailRecursive(f));
    t.true(f.instructions.some(tas => tas.kind == 'call'));
});

test('peephole reaches a fixed point', t => {
    [fibonacci, factorial, loop, generic].forEach(module => {
        lower(module).functions.forEach(f => {
            const once = peepholeWithTrace(f).function;
            const twice = peepholeWithTrace(once);
            t.deepEqual(twice.function.instructions, once.instructions);
            t.deepEqual(twice.applied, []);
        });
    });
});

test('peephole decisions do not depend on register numbering', t => {
    const renumber = (r: Register): Register => ({ ...r, id: r.id + 100 });
    lower(loop).functions.forEach(f => {
        const renumbered: Function = {
            ...f,
            parameters: f.parameters.map(p => ({ ...p, register: renumber(p.register) })),
            registers: f.registers.map(renumber),
            instructions: f.instructions.map(tas => mapRegisters(tas, renumber)),
        };
        t.deepEqual(peepholeWithTrace(renumbered).applied, peepholeWithTrace(f).applied);
    });
});

test('SMC functions get patchable parameter slots on the Z80', t => {
    const { program, output } = compiled(compile(smcAdd, { target: 'z80-smc', comments: false }));
    const f = functionNamed(program, 'add_smc');
    t.is(f.convention, 'smc');
    t.deepEqual(smcSlots(f), [
        { parameter: 'a', label: 'Smc_add_smc_a_imm', offset: 1, bytes: 2 },
        { parameter: 'b', label: 'Smc_add_smc_b_imm', offset: 7, bytes: 2 },
    ]);
    const text = lines(output);
    t.true(text.includes('Smc_add_smc_a_imm EQU Smc_add_smc_a_op+1'));
    t.true(text.includes('PATCH_TABLE:'));
    t.true(text.includes('    DW Smc_add_smc_a_imm'));
    t.true(text.includes('    LD (Smc_add_smc_a_imm),HL'));
    t.is(functionNamed(program, 'main').convention, 'standard');
});

test('loops patch SMC parameters before every call', t => {
    const { program, output } = compiled(compile(loop, { target: 'z80-smc', comments: false }));
    t.is(functionNamed(program, 'add_smc').convention, 'smc');
    const text = lines(output);
    const positions = [
        'Loop_loop_test_for_1:',
        '    LD (Loop_add_smc_a_imm),A',
        '    LD (Loop_add_smc_b_imm),A',
        '    CALL Loop_add_smc',
        '    JP Loop_loop_test_for_1',
    ].map(line => text.indexOf(line));
    t.false(positions.includes(-1));
    positions.slice(1).forEach((position, i) => t.true(position > positions[i]));
});

test('SMC is only granted where the target supports it', t => {
    const z80Program = compiled(compile(smcAdd, { target: 'z80-smc' })).program;
    t.deepEqual(requiredFeatures(functionNamed(z80Program, 'add_smc')), ['smc']);
    t.deepEqual(emit(z80Program, 'c99', { comments: false }), {
        errors: [{ kind: 'missingCapability', function: 'Smc_add_smc', target: 'c99', feature: 'smc' }],
    });

    const { program, output } = compiled(compile(smcAdd, { target: 'c99', comments: false }));
    t.is(functionNamed(program, 'add_smc').convention, 'standard');
    t.true(lines(output).includes('u16 Smc_add_smc(u16 a, u16 b);'));
    t.true(lines(output).includes('int main(void) {'));
});

test('recursive SMC functions are a convention conflict', t => {
    t.deepEqual(compile(smcConflict, { target: 'z80-smc' }), {
        errors: [
            { kind: 'conventionConflict', function: 'Conflict_sum_to', cycle: ['Conflict_sum_to', 'Conflict_sum_to'] },
        ],
    });
    t.true('output' in compile(smcConflict, { target: 'c99' }));
});

test('tail calls must become loops before SMC applies', t => {
    const name = symbolToString(fibTail);
    t.deepEqual(compile(fibonacci, { target: 'z80-smc', optimize: { tailCalls: false } }), {
        errors: [{ kind: 'conventionConflict', function: name, cycle: [name, name] }],
    });
    const { program } = compiled(compile(fibonacci, { target: 'z80-smc' }));
    t.is(functionNamed(program, 'fib_tail').convention, 'smc');
});

test('target output', t => {
    const z80 = lines(compiled(compile(factorial, { target: 'z80-smc', comments: false })).output);
    t.true(z80.includes('    PUSH IX'));
    t.true(z80.includes('Fact_factorial_epilogue:'));

    const withComments = lines(compiled(compile(factorial, { target: 'z80-smc' })).output);
    t.true(withComments.includes('    PUSH IX ; Set up frame'));

    const mos6502 = lines(compiled(compile(factorial, { target: 'mos6502', comments: false })).output);
    t.true(mos6502.includes('    .import __multiply_u8'));
    t.true(mos6502.includes('    JSR Fact_factorial'));
    const mangled = lines(compiled(compile(generic, { target: 'mos6502', comments: false })).output);
    t.true(mangled.includes('    .feature dollar_in_identifiers'));
    t.true(mangled.includes('Generic_max$u8$u8:'));

    const m68k = lines(compiled(compile(factorial, { target: 'm68k', comments: false })).output);
    t.true(m68k.includes('    mulu.w d1,d0'));

    const ssa = lines(compiled(compile(loop, { target: 'llvm', comments: false })).output);
    t.true(ssa.includes('%String = type { i16, ptr }'));
    t.true(ssa.includes('define i8 @Loop_loop_test(i8 %r1.arg) {'));
});

test('controlFlowGraph basic test', t => {
    const condition: Register = { id: 1, type: builtinTypes.bool };
    const instructions: Statement[] = [
        { kind: 'label', name: 'a', why: '' },
        { kind: 'gotoIfFalse', condition, label: 'b', why: '' },
        { kind: 'goto', label: 'a', why: '' },
        { kind: 'label', name: 'b', why: '' },
        { kind: 'return', register: null, why: '' },
    ];
    const cfg = controlFlowGraph(instructions);
    t.deepEqual(
        cfg.blocks.map(b => b.name),
        ['a', null, 'b']
    );
    t.deepEqual(cfg.connections, [
        { from: 0, to: 2 },
        { from: 0, to: 1 },
        { from: 1, to: 0 },
    ]);
    t.deepEqual(cfg.exits, [2]);
});

test('compiled programs find their entry points', t => {
    const program = compiled(compile(generic)).program;
    const instance: Type[] = [u16, u16];
    const f = findFunction(program, { module: 'Generic', name: 'max', mangling: instance });
    t.truthy(f);
});
