import { QueryFailedError } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';

type EntityClass<T> = new () => T;
type Where = Record<string, unknown>;
type Order = Record<string, 'ASC' | 'DESC'>;

interface FindOptions {
  where?: Where;
  order?: Order;
  skip?: number;
  take?: number;
  lock?: unknown;
}

const sameValue = (left: unknown, right: unknown): boolean => {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  return left === right;
};

const compare = (left: unknown, right: unknown): number => {
  const l = left instanceof Date ? left.getTime() : left;
  const r = right instanceof Date ? right.getTime() : right;
  if (l === r) return 0;
  if (l === null || l === undefined) return -1;
  if (r === null || r === undefined) return 1;
  if (typeof l === 'number' && typeof r === 'number') return l - r;
  return String(l).localeCompare(String(r));
};

/**
 * Table of entity rows kept as copies, so callers only change stored state
 * through save like they would against Postgres.
 */
export class InMemoryRepository<T extends object> {
  rows: T[] = [];

  constructor(
    private readonly entity: EntityClass<T>,
    private readonly uniqueKeys: string[][] = [],
  ) {}

  create(plain: Partial<T> = {}): T {
    return Object.assign(new this.entity(), plain);
  }

  async save(entity: T): Promise<T> {
    if (!Reflect.get(entity, 'id')) {
      Reflect.set(entity, 'id', uuidv4());
    }
    const now = new Date();
    if (Reflect.get(entity, 'createdAt') === undefined) {
      Reflect.set(entity, 'createdAt', now);
    }
    Reflect.set(entity, 'updatedAt', now);

    const id = Reflect.get(entity, 'id');
    for (const key of this.uniqueKeys) {
      const clash = this.rows.some(
        (row) =>
          Reflect.get(row, 'id') !== id &&
          key.every((column) => sameValue(Reflect.get(row, column), Reflect.get(entity, column))),
      );
      if (clash) {
        throw new QueryFailedError(
          `INSERT INTO ${this.entity.name}`,
          [],
          Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' }),
        );
      }
    }

    const index = this.rows.findIndex((row) => Reflect.get(row, 'id') === id);
    if (index >= 0) {
      this.rows[index] = this.copy(entity);
    } else {
      this.rows.push(this.copy(entity));
    }
    return entity;
  }

  async findOne(options: FindOptions): Promise<T | null> {
    const [first] = this.filter(options.where);
    return first ? this.copy(first) : null;
  }

  async find(options: FindOptions = {}): Promise<T[]> {
    let rows = this.filter(options.where);
    const order = options.order;
    if (order) {
      rows = [...rows].sort((a, b) => {
        for (const [column, direction] of Object.entries(order)) {
          const result = compare(Reflect.get(a, column), Reflect.get(b, column));
          if (result !== 0) return direction === 'ASC' ? result : -result;
        }
        return 0;
      });
    }
    const start = options.skip ?? 0;
    const end = options.take === undefined ? undefined : start + options.take;
    return rows.slice(start, end).map((row) => this.copy(row));
  }

  async findAndCount(options: FindOptions = {}): Promise<[T[], number]> {
    return [await this.find(options), this.filter(options.where).length];
  }

  async count(options: FindOptions = {}): Promise<number> {
    return this.filter(options.where).length;
  }

  async increment(where: Where, column: string, value: number): Promise<void> {
    for (const row of this.filter(where)) {
      const current = Reflect.get(row, column);
      Reflect.set(row, column, (typeof current === 'number' ? current : 0) + value);
    }
  }

  snapshot(): T[] {
    return this.rows.map((row) => this.copy(row));
  }

  restore(rows: T[]): void {
    this.rows = rows;
  }

  private filter(where: Where = {}): T[] {
    return this.rows.filter((row) =>
      Object.entries(where).every(([column, value]) => sameValue(Reflect.get(row, column), value)),
    );
  }

  private copy(row: T): T {
    return Object.assign(new this.entity(), row);
  }
}

/**
 * Stand-in for the TypeORM DataSource and EntityManager. A transaction
 * whose callback throws restores every table to its state before the call.
 * Transactions run one at a time, which stands in for the row locks a
 * real transaction would hold until commit.
 */
export class InMemoryDataSource {
  readonly manager = {
    getRepository: <T extends object>(entity: EntityClass<T>) => this.repository(entity),
    create: <T extends object>(entity: EntityClass<T>, plain: Partial<T>) =>
      this.repository(entity).create(plain),
    save: <T extends object>(entity: EntityClass<T>, row: T) => this.repository(entity).save(row),
    increment: <T extends object>(entity: EntityClass<T>, where: Where, column: string, value: number) =>
      this.repository(entity).increment(where, column, value),
  };

  transactions = 0;
  private queue: Promise<void> = Promise.resolve();
  private readonly tables = new Map<EntityClass<object>, InMemoryRepository<object>>();

  private readonly uniqueKeys: Map<EntityClass<object>, string[][]>;

  constructor(uniqueKeys: Array<[EntityClass<object>, string[][]]> = []) {
    this.uniqueKeys = new Map(uniqueKeys);
  }

  repository<T extends object>(entity: EntityClass<T>): InMemoryRepository<T> {
    const existing = this.tables.get(entity);
    if (existing) {
      // the map is keyed by the entity class, so the row type matches
      return existing as InMemoryRepository<T>;
    }
    const created = new InMemoryRepository<T>(entity, this.uniqueKeys.get(entity));
    this.tables.set(entity, created);
    return created;
  }

  transaction<R>(work: (manager: InMemoryDataSource['manager']) => Promise<R>): Promise<R> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runTransaction<R>(work: (manager: InMemoryDataSource['manager']) => Promise<R>): Promise<R> {
    this.transactions += 1;
    const snapshots = new Map<EntityClass<object>, object[]>();
    for (const [entity, table] of this.tables) {
      snapshots.set(entity, table.snapshot());
    }
    try {
      return await work(this.manager);
    } catch (error) {
      for (const [entity, table] of this.tables) {
        table.restore(snapshots.get(entity) ?? []);
      }
      throw error;
    }
  }
}
