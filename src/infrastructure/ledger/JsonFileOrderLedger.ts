import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Order } from '../../domain/models.js';
import { PersistenceError } from '../../domain/errors/index.js';
import { Logger, silentLogger } from '../../logger.js';
import { IOrderLedger } from './IOrderLedger.js';
import { WriteQueue } from './WriteQueue.js';
import { StoredOrder, fromStoredOrder, storedLedgerSchema, toStoredOrder } from './ledgerRecord.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Order history kept as one JSON array on disk.
 *
 * Every append re-reads the whole file, appends, and replaces the file through a
 * temp-file rename. Appends go through a single write queue, so two commits never
 * observe the same ledger length. Only one process may write a given file.
 */
export class JsonFileOrderLedger implements IOrderLedger {
  private readonly queue = new WriteQueue();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async readAll(): Promise<Order[]> {
    const stored = await this.readStored();
    return stored.map(fromStoredOrder);
  }

  append(build: (ledgerLength: number) => Order): Promise<Order> {
    return this.queue.run(async () => {
      const stored = await this.readStored();
      const order = build(stored.length);
      await this.writeStored([...stored, toStoredOrder(order)]);
      this.logger.info({ orderId: order.id, ledgerLength: stored.length + 1 }, 'order appended to ledger');
      return order;
    });
  }

  private async readStored(): Promise<StoredOrder[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      // no ledger yet: start empty, the first append creates the file
      if (isMissingFile(err)) return [];
      throw new PersistenceError(`Order ledger '${this.filePath}' could not be read.`, err);
    }

    if (text.trim() === '') return [];

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`Order ledger '${this.filePath}' is not valid JSON.`, err);
    }

    // never overwrite a file we do not understand
    const result = storedLedgerSchema.safeParse(raw);
    if (!result.success) {
      throw new PersistenceError(`Order ledger '${this.filePath}' is not a valid order list.`, result.error);
    }
    return result.data;
  }

  private async writeStored(orders: StoredOrder[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(orders, null, 2)}\n`, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(cleanupErr => {
        this.logger.warn({ err: cleanupErr, file: tmpPath }, 'could not remove temporary ledger file');
      });
      throw new PersistenceError(`Order ledger '${this.filePath}' could not be written.`, err);
    }
  }
}
