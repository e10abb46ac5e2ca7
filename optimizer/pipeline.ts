import { Program } from '../threeAddressCode/Program';
import { Function } from '../threeAddressCode/Function';
import { symbolToString } from '../threeAddressCode/FunctionSymbol';
import { TargetDescriptor } from '../TargetDescriptor';
import { CompileOptions, SmcPolicy } from '../options';
import { CompileError } from '../CompileError';
import { recursionCycle } from '../callGraph';
import peephole from './peephole';
import convertTailCalls, { isTailRecursive } from './tailCall';

export type OptimizeResult = { program: Program } | { errors: CompileError[] };

type PipelineOptions = Pick<CompileOptions, 'optimize' | 'smc'>;

const wantsSmc = (f: Function, policy: SmcPolicy): boolean => {
    switch (policy) {
        case 'all':
            return true;
        case 'annotated':
            return f.smcRequested;
        case 'none':
            return false;
    }
};

export const optimizeFunction = (f: Function, { optimize }: Pick<CompileOptions, 'optimize'>): Function => {
    let result = optimize.peephole ? peephole(f) : f;
    result = { ...result, isTailRecursive: isTailRecursive(result) };
    if (optimize.tailCalls && result.isTailRecursive) {
        result = convertTailCalls(result);
        if (optimize.peephole) result = peephole(result);
    }
    return result;
};

// Optimize every function, then pick calling conventions. SMC is only given to functions that can't be
// re-entered once their tail calls are gone.
export default (program: Program, options: PipelineOptions, target: TargetDescriptor): OptimizeResult => {
    const optimized: Program = {
        ...program,
        functions: program.functions.map(f => optimizeFunction(f, options)),
    };
    const errors: CompileError[] = [];
    const functions = optimized.functions.map(f => {
        if (!target.supportsSmc || !wantsSmc(f, options.smc)) return f;
        const cycle = recursionCycle(optimized, f);
        if (cycle) {
            errors.push({ kind: 'conventionConflict', function: symbolToString(f.symbol), cycle });
            return f;
        }
        const smc: Function = { ...f, convention: 'smc' };
        return smc;
    });
    if (errors.length > 0) return { errors };
    return { program: { ...optimized, functions } };
};
