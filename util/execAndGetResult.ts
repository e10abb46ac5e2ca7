import { exec } from 'child-process-promise';
import { ExecutionResult } from '../api';

type ExecFailure = { code?: unknown; stdout?: unknown };

const isExecFailure = (e: unknown): e is ExecFailure => typeof e === 'object' && e !== null;

export default async (executorName: string, command: string): Promise<ExecutionResult> => {
    try {
        const result = await exec(command);
        return { exitCode: 0, stdout: result.stdout, executorName };
    } catch (e) {
        if (isExecFailure(e) && typeof e.code === 'number') {
            const stdout = typeof e.stdout === 'string' ? e.stdout : '';
            return { exitCode: e.code, stdout, executorName };
        }
        return { error: `Couldn't get exit code: ${String(e)}`, executorName };
    }
};
