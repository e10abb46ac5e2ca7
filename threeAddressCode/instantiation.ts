import deepEqual from 'deep-equal';
import { FunctionDeclaration } from '../ast';
import { Type, substitute, mentions, nestingDepth, shortName } from '../types';
import { FunctionSymbol } from './FunctionSymbol';
import { Function } from './Function';
import { InstantiationLimits } from '../options';
import { CompileError } from '../CompileError';
import drain from '../util/list/drain';

export type Instance = {
    template: FunctionDeclaration;
    typeArguments: Type[];
    bindings: Map<string, Type>;
    symbol: FunctionSymbol;
    // Filled in once the body has been lowered.
    function?: Function;
};

export type InstantiateResult = { instance: Instance } | { error: CompileError };

export const bindTypeParameters = (template: FunctionDeclaration, typeArguments: Type[]): Map<string, Type> => {
    const bindings = new Map<string, Type>();
    template.typeParameters.forEach((name, i) => bindings.set(name, typeArguments[i]));
    return bindings;
};

// Concrete parameter types in declaration order, then any type argument no parameter mentions.
export const mangling = (template: FunctionDeclaration, typeArguments: Type[]): Type[] => {
    const bindings = bindTypeParameters(template, typeArguments);
    const parameterTypes = template.parameters.map(p => substitute(p.type, bindings));
    const undetermined = template.typeParameters
        .map((name, i) => ({ name, type: typeArguments[i] }))
        .filter(({ name }) => !template.parameters.some(p => mentions(p.type, name)))
        .map(({ type }) => type);
    return [...parameterTypes, ...undetermined];
};

// One entry per (template, type arguments). The first request reserves the entry and queues its body
// for lowering; later requests get the same instance back.
export class InstantiationCache {
    private readonly instances: Instance[] = [];
    private readonly queue: Instance[] = [];

    constructor(private readonly module: string, private readonly limits: InstantiationLimits) {}

    instantiate(template: FunctionDeclaration, typeArguments: Type[]): InstantiateResult {
        const existing = this.instances.find(
            i => i.template === template && deepEqual(i.typeArguments, typeArguments, { strict: true })
        );
        if (existing) return { instance: existing };

        const fail = (reason: string): InstantiateResult => ({
            error: { kind: 'nonTerminatingInstantiation', template: template.name, typeArguments, reason },
        });
        if (typeArguments.length != template.typeParameters.length) {
            return fail(`expected ${template.typeParameters.length} type arguments, got ${typeArguments.length}`);
        }
        const tooDeep = typeArguments.find(t => nestingDepth(t) > this.limits.maxTypeDepth);
        if (tooDeep) {
            return fail(
                `type argument ${shortName(tooDeep)} nests deeper than ${this.limits.maxTypeDepth} levels`
            );
        }
        const siblings = this.instances.filter(i => i.template === template).length;
        if (siblings >= this.limits.maxInstancesPerTemplate) {
            return fail(`more than ${this.limits.maxInstancesPerTemplate} distinct instantiations`);
        }

        const instance: Instance = {
            template,
            typeArguments,
            bindings: bindTypeParameters(template, typeArguments),
            symbol: { module: this.module, name: template.name, mangling: mangling(template, typeArguments) },
        };
        this.instances.push(instance);
        this.queue.push(instance);
        return { instance };
    }

    // Lower queued bodies until no new instantiations appear.
    drain(lower: (instance: Instance) => Function | null): void {
        drain(this.queue, instance => {
            const lowered = lower(instance);
            if (lowered) instance.function = lowered;
        });
    }

    // Abandon queued work after a fatal error.
    clear(): void {
        this.queue.length = 0;
    }

    get lowered(): Function[] {
        const result: Function[] = [];
        this.instances.forEach(i => {
            if (i.function) result.push(i.function);
        });
        return result;
    }
}
