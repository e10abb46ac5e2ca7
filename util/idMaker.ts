export default () => {
    let id = 0;
    return (): number => {
        id++;
        return id;
    };
};
