import { SourceLocation } from './ast';
import { Type, listToString } from './types';
import { TargetName, Feature } from './TargetDescriptor';
import join from './util/join';
import unhandled from './util/never';

export type CompileError =
    // The front end asked for something the IR has no instruction for.
    | { kind: 'unsupportedOperation'; function: string; construct: string; sourceLocation?: SourceLocation }
    | { kind: 'nonTerminatingInstantiation'; template: string; typeArguments: Type[]; reason: string }
    | { kind: 'missingCapability'; function: string; target: TargetName; feature: Feature }
    // An SMC function that can be re-entered: its patched parameter slots would be overwritten mid-call.
    | { kind: 'conventionConflict'; function: string; cycle: string[] }
    | { kind: 'emitterInternal'; function: string; target: TargetName; message: string };

const location = (l: SourceLocation | undefined): string => (l ? ` at line ${l.line}, column ${l.column}` : '');

export const toString = (e: CompileError): string => {
    switch (e.kind) {
        case 'unsupportedOperation':
            return `Unsupported operation in ${e.function}${location(e.sourceLocation)}: ${e.construct}`;
        case 'nonTerminatingInstantiation':
            return `Instantiating ${e.template}<${listToString(e.typeArguments)}> does not terminate: ${e.reason}`;
        case 'missingCapability':
            return `${e.function} needs ${e.feature}, which target ${e.target} does not support`;
        case 'conventionConflict':
            return `${e.function} uses the SMC calling convention but is recursive (${join(e.cycle, ' -> ')}) and could not be converted to a loop`;
        case 'emitterInternal':
            return `Could not emit ${e.function} for ${e.target}: ${e.message}`;
        default:
            return unhandled(e, 'CompileError toString');
    }
};
