/**
 * Entry script for blocking-handler worker threads, evaluated as CommonJS.
 * Each job names an absolute module path and an export; the result or the
 * thrown error's name and message go back to the main thread.
 */
export const BLOCKING_WORKER_SOURCE = `
'use strict';
const { parentPort } = require('node:worker_threads');

function describeError(error) {
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { name: 'Error', message: String(error) };
}

parentPort.on('message', (job) => {
    Promise.resolve()
        .then(() => {
            const loaded = require(job.file);
            const handler = loaded[job.exportName];
            if (typeof handler !== 'function') {
                throw new TypeError("Export '" + job.exportName + "' of " + job.file + ' is not a function');
            }
            return handler(job.params);
        })
        .then(
            (result) => parentPort.postMessage({ id: job.id, ok: true, result }),
            (error) => parentPort.postMessage({ id: job.id, ok: false, error: describeError(error) })
        )
        .catch((error) => parentPort.postMessage({ id: job.id, ok: false, error: describeError(error) }));
});
`;
