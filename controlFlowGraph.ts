import debug from './util/debug';
import last from './util/list/last';
import join from './util/join';
import { Statement, toString as tasToString } from './threeAddressCode/Statement';

export type BasicBlock = {
    // The label that starts the block, if it starts with one.
    name: string | null;
    instructions: Statement[];
};

export type ControlFlowGraph = {
    blocks: BasicBlock[];
    labelToIndexMap: Map<string, number>;
    connections: {
        from: number;
        to: number;
    }[];
    exits: number[];
};

const blockBehaviour = (tas: Statement): 'endBlock' | 'beginBlock' | 'midBlock' => {
    switch (tas.kind) {
        case 'loadImmediate':
        case 'move':
        case 'binaryOperation':
        case 'compare':
        case 'testZero':
        case 'convert':
        case 'increment':
        case 'decrement':
        case 'call':
        case 'addressOf':
        case 'arrayIndex':
        case 'load':
        case 'store':
            return 'midBlock';
        case 'label':
            return 'beginBlock';
        case 'return':
        case 'goto':
        case 'gotoIfFalse':
            return 'endBlock';
        default:
            throw debug(`${JSON.stringify(tas)} unhandled in blockBehaviour`);
    }
};

const blockName = (instructions: Statement[]): string | null => {
    const first = instructions[0];
    if (!first) throw debug('empty block in blockName');
    return first.kind == 'label' ? first.name : null;
};

type Exits = { label: string | null; next: boolean; exit: boolean };

export const blockExits = (instructions: Statement[]): Exits => {
    const tas = last(instructions);
    if (!tas) throw debug('empty block in blockExits');
    switch (tas.kind) {
        case 'goto':
            return { label: tas.label, next: false, exit: false };
        case 'gotoIfFalse':
            return { label: tas.label, next: true, exit: false };
        case 'return':
            return { label: null, next: false, exit: true };
        default:
            return { label: null, next: true, exit: false };
    }
};

export const toDotFile = ({ blocks, connections, exits }: ControlFlowGraph): string => {
    let dotText = 'digraph {\n';
    dotText += `Entry [style="invis"]\n`;
    dotText += `Entry -> node_0\n`;

    blocks.forEach(({ instructions }, index) => {
        const label = join(instructions.map(tasToString), '\\l')
            .replace(/"/g, '\\"')
            .replace(/:/g, '\\:');
        dotText += `node_${index} [shape="box", label="${label}\\l"]\n`;
    });

    dotText += `Exit [style="invis"]\n`;
    exits.forEach(exit => {
        dotText += `node_${exit} -> Exit\n`;
    });
    connections.forEach(({ from, to }) => {
        dotText += `node_${from} -> node_${to}\n`;
    });
    dotText += '}';
    return dotText;
};

export const controlFlowGraph = (instructions: Statement[]): ControlFlowGraph => {
    const blocks: BasicBlock[] = [];
    let currentBlock: Statement[] = [];
    const finishBlock = () => {
        if (currentBlock.length > 0) {
            blocks.push({ instructions: currentBlock, name: blockName(currentBlock) });
        }
        currentBlock = [];
    };
    instructions.forEach(tas => {
        const change = blockBehaviour(tas);
        if (change == 'midBlock') {
            currentBlock.push(tas);
        } else if (change == 'endBlock') {
            currentBlock.push(tas);
            finishBlock();
        } else if (change == 'beginBlock') {
            finishBlock();
            currentBlock = [tas];
        }
    });
    finishBlock();

    const labelToIndexMap = new Map<string, number>();
    blocks.forEach((block, index) => {
        if (block.name) labelToIndexMap.set(block.name, index);
    });

    const connections: { from: number; to: number }[] = [];
    const exits: number[] = [];
    blocks.forEach((block, index) => {
        const { label, next, exit } = blockExits(block.instructions);
        if (label) {
            const to = labelToIndexMap.get(label);
            if (to === undefined) throw debug(`jump to missing label ${label}`);
            connections.push({ from: index, to });
        }
        if (next && index + 1 < blocks.length) {
            connections.push({ from: index, to: index + 1 });
        }
        if (exit) {
            exits.push(index);
        }
    });

    return {
        blocks,
        connections,
        labelToIndexMap,
        exits,
    };
};
