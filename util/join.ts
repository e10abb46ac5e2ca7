export default (strings: string[], joiner: string): string => strings.join(joiner);
