import type { OutboxRecord } from '../../src/platform/application/ports/outbox-store';
import type { RegistrationRow } from '../../src/registration/infrastructure/registration.rows';
import type { StaffInvitationRow } from '../../src/staff/infrastructure/staff-invitation.rows';
import type {
  StaffRow,
  StudentRow,
  UserRow,
} from '../../src/users/infrastructure/user.rows';

export type MemoryTables = {
  registrations: RegistrationRow[];
  staffInvitations: StaffInvitationRow[];
  users: UserRow[];
  students: StudentRow[];
  staff: StaffRow[];
  outbox: OutboxRecord[];
};

/** Transaction handle: a private copy of every table. */
export type MemoryTx = Readonly<{ tables: MemoryTables }>;

/**
 * Raised the way pg reports a unique violation.
 */
export class UniqueViolationError extends Error {
  readonly code = '23505';

  constructor(readonly constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
    this.name = 'UniqueViolationError';
  }
}

const emptyTables = (): MemoryTables => ({
  registrations: [],
  staffInvitations: [],
  users: [],
  students: [],
  staff: [],
  outbox: [],
});

/**
 * Serializable in-process database. Each transaction works on a clone of
 * the committed tables; the clone replaces them only when the work
 * resolves. Transactions run one at a time.
 */
export class MemoryDatabase {
  private committed: MemoryTables = emptyTables();
  private queue: Promise<void> = Promise.resolve();

  /** Consumer positions live outside transactions, as in `outbox_offsets`. */
  readonly offsets = new Map<string, number>();

  commits = 0;
  rollbacks = 0;

  get tables(): Readonly<MemoryTables> {
    return this.committed;
  }

  async transaction<T>(work: (tx: MemoryTx) => Promise<T>): Promise<T> {
    const previous = this.queue;
    let release = () => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      const tables = structuredClone(this.committed);
      try {
        const result = await work({ tables });
        this.committed = tables;
        this.commits += 1;
        return result;
      } catch (error) {
        this.rollbacks += 1;
        throw error;
      }
    } finally {
      release();
    }
  }
}
