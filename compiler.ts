import { Module } from './ast';
import { Program } from './threeAddressCode/Program';
import { makeProgram } from './threeAddressCode/generator';
import { CompileError } from './CompileError';
import { CompileOptionsInput, resolveOptions } from './options';
import { TargetDescriptor, targets } from './TargetDescriptor';
import optimize from './optimizer/pipeline';
import { emit } from './backend-utils';

export type CompileResult = { program: Program; output: string; target: TargetDescriptor } | { errors: CompileError[] };

// Lower, optimize for the chosen target, then emit. The first stage to fail decides the result.
export const compile = (module: Module, optionsInput: CompileOptionsInput = {}): CompileResult => {
    const options = resolveOptions(optionsInput);
    const target = targets[options.target];

    const lowered = makeProgram(module, options);
    if ('errors' in lowered) return lowered;

    const optimized = optimize(lowered.program, options, target);
    if ('errors' in optimized) return optimized;

    const emitted = emit(optimized.program, options.target, options);
    if ('errors' in emitted) return emitted;

    return { program: optimized.program, output: emitted.output, target };
};

export default compile;
