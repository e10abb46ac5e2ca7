import debug from './debug';

// Put in the default branch of a switch over a closed union to get an exhaustiveness check.
export default (n: never, where: string): never => {
    throw debug(`${JSON.stringify(n)} unhandled in ${where}`);
};
