import type { Request, Response } from 'express';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import { mapError, sendError } from '../shared.js';

export interface StaticDeps {
    staticDir: string;
}

const STATIC_PREFIX = '/static/';

/**
 * Map a request path onto a file under the static root. Returns 'forbidden'
 * for anything that escapes the root and null for paths that are not static.
 */
export function resolveStaticPath(staticRoot: string, requestPath: string): string | 'forbidden' | null {
    const root = path.resolve(staticRoot);
    if (requestPath === '/') {
        return path.join(root, 'index.html');
    }
    if (!requestPath.startsWith(STATIC_PREFIX)) {
        return null;
    }

    let relative: string;
    try {
        relative = decodeURIComponent(requestPath.slice(STATIC_PREFIX.length));
    } catch {
        return 'forbidden';
    }

    const filePath = path.resolve(root, relative);
    if (filePath !== root && !filePath.startsWith(`${root}${path.sep}`)) {
        return 'forbidden';
    }
    return filePath;
}

async function isRegularFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT' || fsError.code === 'ENOTDIR') {
            return false;
        }
        throw error;
    }
}

/** GET / and GET /static/* — files from the static root. */
export function handleStatic(deps: StaticDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const target = resolveStaticPath(deps.staticDir, req.path);
        if (target === 'forbidden') {
            sendError(res, 'Forbidden', 403);
            return;
        }
        if (target === null) {
            sendError(res, 'Not Found', 404);
            return;
        }

        let found: boolean;
        try {
            found = await isRegularFile(target);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
            return;
        }
        if (!found) {
            sendError(res, 'Not Found', 404);
            return;
        }

        res.sendFile(target, { dotfiles: 'allow' }, (err) => {
            if (err && !res.headersSent) {
                sendError(res, 'Not Found', 404);
            }
        });
    };
}
