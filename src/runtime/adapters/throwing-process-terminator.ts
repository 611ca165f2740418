import type { ProcessExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: turns an accidental exit into a thrown error.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ProcessExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
