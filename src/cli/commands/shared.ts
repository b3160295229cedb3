import type { Command } from 'commander';
import { isAmmError } from '../../pool/errors.js';
import { error } from '../../utils/cli.js';
import { Session } from '../session.js';

export interface GlobalOptions {
    data?: string;
}

/**
 * Run a command body against a loaded session. State is saved only when the
 * body returns normally; failures print and set a non-zero exit code.
 */
export function withSession(command: Command, body: (session: Session) => void, persist: boolean = true): void {
    const { data } = command.optsWithGlobals<GlobalOptions>();
    try {
        const session = new Session({ dataDir: data });
        body(session);
        if (persist) {
            session.save();
        }
    } catch (err) {
        if (isAmmError(err)) {
            error(`${err.kind} (${err.code}): ${err.message}`);
        } else {
            error(err instanceof Error ? err.message : String(err));
        }
        process.exitCode = 1;
    }
}
