import { file as tmpFile, FileResult } from 'tmp-promise';
import { writeFile } from 'fs-extra';

// Write contents to a fresh temporary file named after the program and return the file handle.
export default async (contents: string, name: string, extension: string): Promise<FileResult> => {
    const file = await tmpFile({ template: `${name}-XXXXXX.${extension}` });
    await writeFile(file.path, contents);
    return file;
};
