import { rename, rm, writeFile } from "fs/promises";
import { AssemblyError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

let tempCounter = 0;

/**
 * Writes a document so that readers see either the old file or the whole
 * new one: the text goes to a temporary sibling first, then replaces the
 * target with a rename.
 */
export async function writeDocumentAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${tempCounter++}.tmp`;

    try {
        await writeFile(tempPath, content, "utf-8");
        await rename(tempPath, filePath);
    } catch (e) {
        await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            Logger.warn(`[DocumentWriter] Could not remove ${tempPath}`, cleanupError);
        });
        throw new AssemblyError(filePath, e);
    }

    Logger.debug(`[DocumentWriter] Wrote ${filePath}`);
}
