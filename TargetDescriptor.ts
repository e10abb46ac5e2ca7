export type TargetName = 'c99' | 'z80-smc' | 'mos6502' | 'm68k' | 'llvm';

export type Feature = 'smc' | 'integer32' | 'fixedPoint' | 'pointers';

export type AddressingMode =
    | 'immediate'
    | 'absolute'
    | 'zeroPage'
    | 'indexed'
    | 'indirectIndexed'
    | 'registerIndirect'
    | 'stackRelative'
    | 'selfModifying';

export type OutputFormat = 'c' | 'z80-asm' | '6502-asm' | '68k-asm' | 'llvm-ir';

export type TargetDescriptor = {
    name: TargetName;
    description: string;
    bitsInWord: 8 | 16 | 32 | 64;
    pointerBits: 16 | 32 | 64;
    // Whether the machine compares signed and unsigned values with separate instructions or flags.
    comparisons: 'signedAndUnsigned' | 'unsignedOnly';
    addressingModes: AddressingMode[];
    supportsSmc: boolean;
    features: Feature[];
    outputFormat: OutputFormat;
    fileExtension: string;
    commentPrefix: string;
};

const z80: TargetDescriptor = {
    name: 'z80-smc',
    description: 'Zilog Z80, IX frames or self-modifying parameter slots',
    bitsInWord: 8,
    pointerBits: 16,
    comparisons: 'unsignedOnly',
    addressingModes: ['immediate', 'absolute', 'indexed', 'registerIndirect', 'selfModifying'],
    supportsSmc: true,
    features: ['smc', 'integer32', 'fixedPoint', 'pointers'],
    outputFormat: 'z80-asm',
    fileExtension: 'a80',
    commentPrefix: ';',
};

const mos6502: TargetDescriptor = {
    name: 'mos6502',
    description: 'MOS 6502, arguments and locals on the hardware stack page',
    bitsInWord: 8,
    pointerBits: 16,
    comparisons: 'unsignedOnly',
    addressingModes: ['immediate', 'absolute', 'zeroPage', 'indexed', 'indirectIndexed'],
    supportsSmc: false,
    features: ['integer32', 'fixedPoint', 'pointers'],
    outputFormat: '6502-asm',
    fileExtension: 's',
    commentPrefix: ';',
};

const m68k: TargetDescriptor = {
    name: 'm68k',
    description: 'Motorola 68000, link/unlk frames with stack arguments',
    bitsInWord: 32,
    pointerBits: 32,
    comparisons: 'signedAndUnsigned',
    addressingModes: ['immediate', 'absolute', 'registerIndirect', 'stackRelative', 'indexed'],
    supportsSmc: false,
    features: ['integer32', 'fixedPoint', 'pointers'],
    outputFormat: '68k-asm',
    fileExtension: 's',
    commentPrefix: '|',
};

const llvm: TargetDescriptor = {
    name: 'llvm',
    description: 'Portable SSA form in LLVM textual IR',
    bitsInWord: 64,
    pointerBits: 64,
    comparisons: 'signedAndUnsigned',
    addressingModes: ['registerIndirect'],
    supportsSmc: false,
    features: ['integer32', 'fixedPoint', 'pointers'],
    outputFormat: 'llvm-ir',
    fileExtension: 'll',
    commentPrefix: ';',
};

const c99: TargetDescriptor = {
    name: 'c99',
    description: 'Portable C99, the reference for every other target',
    bitsInWord: 64,
    pointerBits: 64,
    comparisons: 'signedAndUnsigned',
    addressingModes: ['registerIndirect'],
    supportsSmc: false,
    features: ['integer32', 'fixedPoint', 'pointers'],
    outputFormat: 'c',
    fileExtension: 'c',
    commentPrefix: '//',
};

export const targets: { [T in TargetName]: TargetDescriptor } = {
    c99,
    'z80-smc': z80,
    mos6502,
    m68k,
    llvm,
};

export const targetNames: TargetName[] = ['c99', 'z80-smc', 'mos6502', 'm68k', 'llvm'];

export const isTargetName = (name: string): name is TargetName => targetNames.some(t => t == name);
