import { Function } from '../threeAddressCode/Function';
import { Register, isEqual as registersEqual } from '../threeAddressCode/Register';
import { Statement, reads, writes, mapReads, mapWrites, jumpTarget } from '../threeAddressCode/Statement';
import { equal as typesAreEqual } from '../types';
import { Comparison } from '../ast';

type Usage = { reads: number; writes: number };

type Analysis = {
    usage: Map<number, Usage>;
    parameters: Set<number>;
    labelReferences: Map<string, number>;
};

type Pattern = {
    name: string;
    size: number;
    // Replacement for the window, or null if the window doesn't match.
    rewrite: (window: Statement[], analysis: Analysis) => Statement[] | null;
};

const analyze = (instructions: Statement[], parameters: Register[]): Analysis => {
    const usage = new Map<number, Usage>();
    const get = (r: Register): Usage => {
        let u = usage.get(r.id);
        if (!u) {
            u = { reads: 0, writes: 0 };
            usage.set(r.id, u);
        }
        return u;
    };
    const labelReferences = new Map<string, number>();
    instructions.forEach(tas => {
        reads(tas).forEach(r => get(r).reads++);
        writes(tas).forEach(r => get(r).writes++);
        const target = jumpTarget(tas);
        if (target) labelReferences.set(target, (labelReferences.get(target) || 0) + 1);
    });
    return { usage, parameters: new Set(parameters.map(p => p.id)), labelReferences };
};

// A temporary: written once, read once, and not bound at function entry. Only these may be folded away.
const isSingleUseTemporary = (r: Register, { usage, parameters }: Analysis): boolean => {
    if (parameters.has(r.id)) return false;
    const u = usage.get(r.id);
    return u !== undefined && u.reads == 1 && u.writes == 1;
};

const plainDestination = (tas: Statement): Register | null => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'binaryOperation':
        case 'compare':
        case 'testZero':
        case 'addressOf':
        case 'arrayIndex':
        case 'load':
            return tas.destination;
        case 'move':
        case 'convert':
            return tas.to;
        case 'call':
            return tas.destination;
        default:
            return null;
    }
};

const patterns: Pattern[] = [
    {
        name: 'selfMove',
        size: 1,
        rewrite: ([tas]) => (tas.kind == 'move' && registersEqual(tas.from, tas.to) ? [] : null),
    },
    {
        name: 'copyBack',
        size: 2,
        rewrite: ([first, second]) => {
            if (first.kind != 'move' || second.kind != 'move') return null;
            if (!registersEqual(first.from, second.to) || !registersEqual(first.to, second.from)) return null;
            return [first];
        },
    },
    {
        name: 'foldImmediateCopy',
        size: 2,
        rewrite: ([load, copy], analysis) => {
            if (load.kind != 'loadImmediate' || copy.kind != 'move') return null;
            if (!registersEqual(load.destination, copy.from)) return null;
            if (!isSingleUseTemporary(load.destination, analysis)) return null;
            if (!typesAreEqual(load.destination.type, copy.to.type)) return null;
            return [{ ...load, destination: copy.to, why: copy.why }];
        },
    },
    {
        name: 'cancelIncrementDecrement',
        size: 2,
        rewrite: ([first, second]) => {
            if (first.kind == 'increment' && second.kind == 'decrement') {
                return registersEqual(first.register, second.register) ? [] : null;
            }
            if (first.kind == 'decrement' && second.kind == 'increment') {
                return registersEqual(first.register, second.register) ? [] : null;
            }
            return null;
        },
    },
    {
        name: 'compareWithZero',
        size: 2,
        rewrite: ([load, compare], analysis) => {
            if (load.kind != 'loadImmediate' || load.value != 0 || compare.kind != 'compare') return null;
            const zero = load.destination;
            if (!isSingleUseTemporary(zero, analysis)) return null;
            const zeroOnRight = registersEqual(compare.rhs, zero);
            if (!zeroOnRight && !registersEqual(compare.lhs, zero)) return null;
            const source = zeroOnRight ? compare.lhs : compare.rhs;
            if (source.type.kind != 'Integer' && source.type.kind != 'Boolean') return null;
            const unsigned = source.type.kind == 'Boolean' || !source.type.signed;
            // x > 0 and 0 < x are x != 0 for unsigned x; x <= 0 and 0 >= x are x == 0.
            const notEqualWhen: Comparison[] = zeroOnRight ? ['!=', '>'] : ['!=', '<'];
            const equalWhen: Comparison[] = zeroOnRight ? ['==', '<='] : ['==', '>='];
            const negated = notEqualWhen.includes(compare.comparison);
            const matches =
                compare.comparison == '==' ||
                compare.comparison == '!=' ||
                (unsigned && (negated || equalWhen.includes(compare.comparison)));
            if (!matches) return null;
            return [
                { kind: 'testZero', source, negated, destination: compare.destination, why: compare.why },
            ];
        },
    },
    {
        name: 'subtractThenTestZero',
        size: 2,
        rewrite: ([subtract, test], analysis) => {
            if (subtract.kind != 'binaryOperation' || subtract.operator != 'subtract') return null;
            if (test.kind != 'testZero' || !registersEqual(subtract.destination, test.source)) return null;
            if (!isSingleUseTemporary(subtract.destination, analysis)) return null;
            return [
                {
                    kind: 'compare',
                    comparison: test.negated ? '!=' : '==',
                    lhs: subtract.lhs,
                    rhs: subtract.rhs,
                    destination: test.destination,
                    why: test.why,
                },
            ];
        },
    },
    {
        name: 'forwardDefinition',
        size: 2,
        rewrite: ([definition, copy], analysis) => {
            if (copy.kind != 'move') return null;
            const temporary = plainDestination(definition);
            if (!temporary || !registersEqual(temporary, copy.from)) return null;
            if (!isSingleUseTemporary(temporary, analysis)) return null;
            if (!typesAreEqual(temporary.type, copy.to.type)) return null;
            return [mapWrites(definition, () => copy.to)];
        },
    },
    {
        name: 'propagateCopy',
        size: 2,
        rewrite: ([copy, consumer], analysis) => {
            if (copy.kind != 'move' || registersEqual(copy.from, copy.to)) return null;
            const temporary = copy.to;
            if (!isSingleUseTemporary(temporary, analysis)) return null;
            if (!typesAreEqual(temporary.type, copy.from.type)) return null;
            if (!reads(consumer).some(r => registersEqual(r, temporary))) return null;
            // increment and decrement also write what they read
            if (consumer.kind == 'increment' || consumer.kind == 'decrement') return null;
            return [mapReads(consumer, r => (registersEqual(r, temporary) ? copy.from : r))];
        },
    },
    {
        name: 'jumpToNextLabel',
        size: 2,
        rewrite: ([jump, label]) => {
            if (jump.kind != 'goto' || label.kind != 'label' || jump.label != label.name) return null;
            return [label];
        },
    },
    {
        name: 'unreachableAfterJump',
        size: 2,
        rewrite: ([jump, next]) => {
            if (jump.kind != 'goto' && jump.kind != 'return') return null;
            if (next.kind == 'label') return null;
            return [jump];
        },
    },
    {
        name: 'unreferencedLabel',
        size: 1,
        rewrite: ([label], { labelReferences }) =>
            label.kind == 'label' && !labelReferences.has(label.name) ? [] : null,
    },
];

// Finds the first matching window and rewrites it.
const step = (
    instructions: Statement[],
    parameters: Register[]
): { instructions: Statement[]; pattern: string } | null => {
    const analysis = analyze(instructions, parameters);
    for (let i = 0; i < instructions.length; i++) {
        for (const pattern of patterns) {
            if (i + pattern.size > instructions.length) continue;
            const window = instructions.slice(i, i + pattern.size);
            const replacement = pattern.rewrite(window, analysis);
            if (replacement) {
                return {
                    instructions: [
                        ...instructions.slice(0, i),
                        ...replacement,
                        ...instructions.slice(i + pattern.size),
                    ],
                    pattern: pattern.name,
                };
            }
        }
    }
    return null;
};

// Rewrite until no pattern matches. Returns the names of the patterns applied, in order.
export const peepholeWithTrace = (f: Function): { function: Function; applied: string[] } => {
    const parameters = f.parameters.map(p => p.register);
    const applied: string[] = [];
    let instructions = f.instructions;
    for (let result = step(instructions, parameters); result; result = step(instructions, parameters)) {
        instructions = result.instructions;
        applied.push(result.pattern);
    }
    return { function: { ...f, instructions }, applied };
};

export default (f: Function): Function => peepholeWithTrace(f).function;
