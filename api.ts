import { Program } from './threeAddressCode/Program';
import { TargetDescriptor } from './TargetDescriptor';
import { CompileError } from './CompileError';
import { CompileOptions } from './options';

export type ExecutionResult =
    | {
          exitCode: number;
          stdout: string;
          executorName: string;
      }
    | { error: string; executorName: string };

export type Executor = {
    name: string;
    // Build and run emitted text. Resolves with an error result when the toolchain isn't available.
    execute: (output: string, programName: string) => Promise<ExecutionResult>;
};

export type EmitOptions = Pick<CompileOptions, 'comments'>;

export type EmitResult = { output: string } | { errors: CompileError[] };

export type Backend = {
    descriptor: TargetDescriptor;
    emit: (program: Program, options: EmitOptions) => EmitResult;
    executors: Executor[];
};
