import { readFile } from 'fs/promises';
import path from 'path';
import type { IViewResolver, IViewTemplate } from '@handheld/types';
import { ValidationError } from '../../../lib/errors.js';

const VIEW_NAME_PATTERN = /^[a-z0-9_-]+(\/[a-z0-9_-]+)*$/i;
const FORMAT_PATTERN = /^[a-z0-9_]+$/i;

/**
 * Extension of every template file.
 */
export const TEMPLATE_EXTENSION = '.md';

/**
 * Resolves views from a directory of markdown templates.
 *
 * A view `pages/home` in format `mobile` lives at `<root>/pages/home.mobile.md`.
 */
export class FileSystemViewResolver implements IViewResolver {
    private readonly root: string;

    /**
     * @param root - Template directory; relative paths resolve against the working directory
     */
    constructor(root: string) {
        this.root = path.resolve(root);
    }

    /**
     * Path a template would have, without checking that it exists.
     *
     * @throws ValidationError if the view name or format could escape the root
     */
    templatePath(name: string, format: string): string {
        if (!VIEW_NAME_PATTERN.test(name)) {
            throw new ValidationError(`Invalid view name "${name}"`);
        }
        if (!FORMAT_PATTERN.test(format)) {
            throw new ValidationError(`Invalid view format "${format}"`);
        }
        return path.join(this.root, `${name}.${format}${TEMPLATE_EXTENSION}`);
    }

    async find(name: string, format: string): Promise<IViewTemplate | null> {
        const templatePath = this.templatePath(name, format);

        try {
            const source = await readFile(templatePath, 'utf8');
            return { name, format, path: templatePath, source };
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }
    }
}

function isMissingFile(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
        return false;
    }
    return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
