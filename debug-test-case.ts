import chalk from 'chalk';
import Table from 'cli-table3';
import { Command } from 'commander';
import { testCases, TestCase } from './test-cases';
import compile from './compiler';
import { Program, toString as programToString } from './threeAddressCode/Program';
import { symbolToString } from './threeAddressCode/FunctionSymbol';
import { interpretFunction, interpretProgram, InterpreterResult } from './interpreter';
import { controlFlowGraph, toDotFile } from './controlFlowGraph';
import { makeProgram } from './threeAddressCode/generator';
import { backendFor } from './backend-utils';
import { toString as errorToString } from './CompileError';
import { TargetName, targetNames, isTargetName, targets } from './TargetDescriptor';
import { defaultCompileOptions } from './options';
import writeTempFile from './util/writeTempFile';

type CliOptions = {
    target?: string;
    peephole: boolean;
    tailCalls: boolean;
    cfg: boolean;
    execute: boolean;
};

const interpret = (program: Program, testCase: TestCase): InterpreterResult => {
    if (!testCase.entry) return interpretProgram(program);
    const { name, mangling, args } = testCase.entry;
    return interpretFunction(program, { module: program.module, name, mangling }, args);
};

const describeResult = (testCase: TestCase, result: InterpreterResult): string => {
    if ('error' in result) return chalk.red(`error: ${result.error}`);
    const valueOk = testCase.value === undefined || result.value === testCase.value;
    const stdoutOk = testCase.stdout === undefined || result.stdout === testCase.stdout;
    const text = `value ${JSON.stringify(result.value)}, stdout ${JSON.stringify(result.stdout)}, depth ${result.maxCallDepth}`;
    return valueOk && stdoutOk ? text : chalk.red(text);
};

(async () => {
    const cli = new Command()
        .argument('<test_name>')
        .option('--target <target>', 'Only compile for this target')
        .option('--no-peephole', 'Skip the peephole pass')
        .option('--no-tail-calls', "Don't turn tail recursion into loops")
        .option('--cfg', 'Write a Graphviz control flow graph for every function')
        .option('--execute', 'Run the output on targets that have a local toolchain')
        .parse(process.argv);
    const options = cli.opts<CliOptions>();
    const testCase = testCases.find(c => c.name == cli.args[0]);
    if (!testCase) {
        console.log(`Could not find a test case named "${cli.args[0]}"`);
        console.log(`Test cases: ${testCases.map(c => c.name).join(', ')}`);
        return;
    }

    let selected: TargetName[] = targetNames;
    if (options.target !== undefined) {
        if (!isTargetName(options.target)) {
            console.log(chalk.red(`Unknown target "${options.target}". Targets: ${targetNames.join(', ')}`));
            return;
        }
        selected = [options.target];
    }

    const lowered = makeProgram(testCase.module, defaultCompileOptions);
    if ('errors' in lowered) {
        console.log(chalk.red('Lowering failed:'));
        lowered.errors.forEach(e => console.log(`    ${errorToString(e)}`));
        return;
    }
    console.log(`Three Address Code: ${(await writeTempFile(programToString(lowered.program), testCase.name, 'txt')).path}`);
    console.log(`Interpreter: ${describeResult(testCase, interpret(lowered.program, testCase))}`);

    const table = new Table({ head: ['Target', 'Result', 'SMC functions', 'Lines', 'Interpreter'] });
    for (const target of selected) {
        const result = compile(testCase.module, {
            target,
            optimize: { peephole: options.peephole, tailCalls: options.tailCalls },
        });
        if ('errors' in result) {
            table.push([target, chalk.red(result.errors.map(errorToString).join('\n')), '', '', '']);
            continue;
        }
        const file = await writeTempFile(result.output, `${testCase.name}-${target}`, targets[target].fileExtension);
        const smc = result.program.functions.filter(f => f.convention == 'smc').map(f => symbolToString(f.symbol));
        table.push([
            target,
            file.path,
            smc.join('\n'),
            `${result.output.split('\n').length}`,
            describeResult(testCase, interpret(result.program, testCase)),
        ]);

        if (options.cfg) {
            for (const f of result.program.functions) {
                const name = `${symbolToString(f.symbol)}-${target}`.replace(/\$/g, '_');
                const dot = await writeTempFile(toDotFile(controlFlowGraph(f.instructions)), name, 'dot');
                console.log(`CFG for ${symbolToString(f.symbol)} on ${target}: ${dot.path}`);
            }
        }

        if (options.execute) {
            for (const executor of backendFor(target).executors) {
                const execution = await executor.execute(result.output, testCase.name);
                if ('error' in execution) {
                    console.log(chalk.red(`${target}/${executor.name}: ${execution.error}`));
                } else {
                    const expected = testCase.stdout === undefined || execution.stdout == testCase.stdout;
                    const text = `${target}/${executor.name}: exit ${execution.exitCode}, stdout ${JSON.stringify(execution.stdout)}`;
                    console.log(expected ? text : chalk.red(text));
                }
            }
        }
    }
    console.log(table.toString());
})().catch(e => {
    console.error(e);
    process.exitCode = 1;
});
