/**
 * Body of the decoding worker. Runs as an eval'd CommonJS script, so it can only use
 * `require`; `workerData.tarModulePath` is resolved by the parent.
 *
 * Jobs:
 * - list:    walk the archive headers without writing anything
 * - extract: unpack into `destination`, never replacing what is already there
 *
 * Every tar warning is collected and returned; the parent decides what it means.
 */
export const ARCHIVE_WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const tar = require(workerData.tarModulePath);

const job = workerData.job;
const warnings = [];
const onwarn = (code, message, data) => {
  const entry = data && data.entry;
  warnings.push({
    code: String(code),
    message: String(message),
    entryPath: entry && entry.path ? String(entry.path) : null,
  });
};

try {
  if (job.kind === 'list') {
    const entries = [];
    tar.t({
      file: job.archivePath,
      sync: true,
      onwarn,
      filter: (entryPath, entry) => {
        entries.push({
          path: String(entryPath),
          type: String(entry.type),
          linkpath: entry.linkpath ? String(entry.linkpath) : null,
        });
        return true;
      },
    });
    parentPort.postMessage({ kind: 'listed', entries, warnings });
  } else {
    let count = 0;
    tar.x({
      file: job.archivePath,
      cwd: job.destination,
      sync: true,
      onwarn,
      keep: true,
      preservePaths: false,
      preserveOwner: false,
      noMtime: !job.preserveTimestamps,
      filter: () => {
        count += 1;
        return true;
      },
    });
    parentPort.postMessage({ kind: 'extracted', count, warnings });
  }
} catch (error) {
  parentPort.postMessage({
    kind: 'failed',
    message: error && error.message ? String(error.message) : String(error),
    tarCode: error && error.code ? String(error.code) : null,
  });
}
`;
