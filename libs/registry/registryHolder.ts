import { getComponentLogger } from '../logging/logger.js';
import { SchemaRegistry } from './schemaRegistry.js';

const logger = getComponentLogger('RegistryHolder');

export type RegistryBuilder = () => SchemaRegistry | Promise<SchemaRegistry>;

/**
 * Holds the sealed registry snapshot in effect.
 *
 * Readers take `current()` once per operation and keep using that snapshot;
 * a reload never touches it. Writers go through `replace()`, which builds a
 * complete new registry, seals it and swaps the reference in one assignment.
 * Replacements run one at a time in call order.
 */
export class RegistryHolder {
    private snapshot: SchemaRegistry;
    private generation = 1;
    private writerQueue: Promise<void> = Promise.resolve();

    constructor(initial: SchemaRegistry) {
        this.snapshot = initial.seal();
    }

    current(): SchemaRegistry {
        return this.snapshot;
    }

    get currentGeneration(): number {
        return this.generation;
    }

    /**
     * Builds and installs a new snapshot. If the builder fails, the current
     * snapshot stays in effect and the returned promise rejects.
     */
    replace(build: RegistryBuilder): Promise<SchemaRegistry> {
        const run = this.writerQueue.then(async () => {
            const next = (await build()).seal();
            this.snapshot = next;
            this.generation += 1;

            logger.info({
                generation: this.generation,
                schemas: next.size,
                typeNames: next.typeNames()
            }, 'Schema registry snapshot replaced');

            return next;
        });

        // Failures reach the caller through `run`; the queue only orders writers.
        this.writerQueue = run.then(() => undefined, () => undefined);
        return run;
    }
}
