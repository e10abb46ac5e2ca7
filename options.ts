import { merge } from 'lodash';
import { TargetName } from './TargetDescriptor';

// Which functions get the self-modifying calling convention on targets that have it.
export type SmcPolicy = 'annotated' | 'all' | 'none';

export type InstantiationLimits = {
    // Deepest pointer/array nesting a type argument may reach.
    maxTypeDepth: number;
    maxInstancesPerTemplate: number;
};

export type CompileOptions = {
    target: TargetName;
    optimize: { peephole: boolean; tailCalls: boolean };
    smc: SmcPolicy;
    instantiation: InstantiationLimits;
    // Emit each instruction's "why" as a comment in the output.
    comments: boolean;
};

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };
export type CompileOptionsInput = DeepPartial<CompileOptions>;

export const defaultCompileOptions: CompileOptions = {
    target: 'c99',
    optimize: { peephole: true, tailCalls: true },
    smc: 'annotated',
    instantiation: { maxTypeDepth: 8, maxInstancesPerTemplate: 64 },
    comments: true,
};

export const resolveOptions = (input: CompileOptionsInput = {}): CompileOptions =>
    merge({}, defaultCompileOptions, input);
