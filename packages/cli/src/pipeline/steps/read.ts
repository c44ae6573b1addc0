import { readFile } from 'node:fs/promises';
import { describeError } from '@award-explorer/core';
import type { PipelineStep } from '../types.js';
import { toArrayBuffer } from '../../utils/buffer.js';

/**
 * Step 1: Read Workbook
 * Reads the uploaded workbook into memory. The core never touches the disk.
 */
export const readInput: PipelineStep = async (state) => {
    try {
        const buffer = await readFile(state.workbookPath);
        state.data = toArrayBuffer(buffer);
    } catch (err) {
        state.errors.push({
            step: 'read',
            message: `Failed to read ${state.workbookPath}: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
