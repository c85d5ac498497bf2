import { configManager } from '../config-manager.js';
import { ServerResult } from '../types.js';
import { logger } from '../utils/logger.js';
import { applyEdits, describeOutcome, type EditOutcome, type EditSpec } from './edit/index.js';
import { readTextFile, validatePath, withFileLock, writeTextFile } from './filesystem.js';
import type { EditOperation } from './schemas.js';

/**
 * Map a wire-level operation onto the engine's edit spec
 */
export function toEditSpec(operation: EditOperation): EditSpec {
    return {
        kind: operation.kind,
        startPattern: operation.start_pattern,
        endPattern: operation.end_pattern,
        afterPattern: operation.after_pattern,
        beforePattern: operation.before_pattern,
        expectedContent: operation.expected_content,
        content: operation.content,
    };
}

export function validateOperations(operations: readonly EditOperation[]): void {
    const { maxOperations } = configManager.getConfig();
    if (operations.length === 0) {
        throw new Error('No operations provided');
    }
    if (operations.length > maxOperations) {
        throw new Error(`Number of operations (${operations.length}) exceeds maximum allowed (${maxOperations})`);
    }
}

function outcomesBlock(outcomes: EditOutcome[], total: number): string {
    return JSON.stringify({ total, outcomes }, null, 2);
}

/**
 * Apply pattern edits to one file. The file is only written when every edit
 * applied, unless persistPartialEdits is configured.
 */
export async function performPatternEdits(requestedPath: string, operations: readonly EditOperation[]): Promise<ServerResult> {
    validateOperations(operations);
    const filePath = await validatePath(requestedPath);
    const { persistPartialEdits } = configManager.getConfig();

    return withFileLock(filePath, async () => {
        const original = await readTextFile(filePath);
        const result = applyEdits(original, operations.map(toEditSpec));
        const lines = result.outcomes.map(describeOutcome);

        if (result.ok) {
            if (result.document !== original) {
                await writeTextFile(filePath, result.document);
            }
            logger.info(`Applied ${operations.length} edit(s) to ${requestedPath}`);
            return {
                content: [
                    {
                        type: "text",
                        text: `Successfully applied ${operations.length} edit${operations.length > 1 ? 's' : ''} to ${requestedPath}\n\n${lines.join('\n')}`,
                    },
                    { type: "text", text: outcomesBlock(result.outcomes, operations.length) },
                ],
            };
        }

        const failedIndex = result.failedIndex ?? result.outcomes.length - 1;
        const appliedCount = failedIndex;
        const notAttempted = operations.length - failedIndex - 1;

        let persistence: string;
        if (appliedCount === 0) {
            persistence = `The file was not modified.`;
        } else if (persistPartialEdits) {
            await writeTextFile(filePath, result.document);
            persistence = `The ${appliedCount} edit(s) before the failure were written to the file.`;
        } else {
            persistence = `The ${appliedCount} edit(s) before the failure were discarded; the file was not modified.`;
        }

        logger.warning(`Edit ${failedIndex + 1} of ${operations.length} failed for ${requestedPath}: ${result.outcomes[failedIndex]?.status}`);

        const summary = [
            `Edit ${failedIndex + 1} of ${operations.length} failed for ${requestedPath}. ${persistence}`,
            ...(notAttempted > 0 ? [`${notAttempted} later edit(s) were not attempted.`] : []),
            '',
            ...lines,
        ];

        return {
            content: [
                { type: "text", text: summary.join('\n') },
                { type: "text", text: outcomesBlock(result.outcomes, operations.length) },
            ],
            isError: true,
        };
    });
}
