// Something that should be impossible happened inside the compiler. Callers throw the result.
export default (why: string): Error => {
    debugger; // tslint:disable-line
    return new Error(`Internal compiler error: ${why}`);
};
