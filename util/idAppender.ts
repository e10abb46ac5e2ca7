import idMaker from './idMaker';

// One counter shared by every prefix, so label_1 and else_2 never collide after renaming.
export default () => {
    const makeId = idMaker();
    return (name: string): string => `${name}_${makeId()}`;
};
