import debug from '../debug';

// Remove items from the front of array and process them with fn until array is empty. fn may push new items.
export default <T>(array: T[], fn: (item: T) => void): void => {
    while (array.length > 0) {
        const item = array.shift();
        if (item === undefined) throw debug('item violation');
        fn(item);
    }
};
