import { describe, expect, it } from 'vitest';
import { KyselyTransactionRunner } from '../../src/platform/infrastructure/persistence/kysely-transaction.runner';
import { RecordingDatabase } from '../support/recording-database';

describe('KyselyTransactionRunner', () => {
  it('commits after the work resolves', async () => {
    const recording = new RecordingDatabase().on(/from "users"/, {
      rows: [{ id: 'u-1' }],
    });
    const runner = new KyselyTransactionRunner(recording.service());

    const rows = await runner.run((tx) =>
      tx.selectFrom('users').select('id').execute()
    );

    expect(rows).toEqual([{ id: 'u-1' }]);
    expect(recording.statements).toEqual([
      'begin',
      'select "id" from "users"',
      'commit',
    ]);
  });

  it('rolls back when the work throws', async () => {
    const recording = new RecordingDatabase();
    const runner = new KyselyTransactionRunner(recording.service());

    await expect(
      runner.run(async (tx) => {
        await tx.selectFrom('users').select('id').execute();
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    expect(recording.statements).toEqual([
      'begin',
      'select "id" from "users"',
      'rollback',
    ]);
  });

  it('opens no transaction once the signal is aborted', async () => {
    const recording = new RecordingDatabase();
    const runner = new KyselyTransactionRunner(recording.service());
    const controller = new AbortController();
    controller.abort();

    await expect(
      runner.run(async () => 'never', { signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });

    expect(recording.statements).toEqual([]);
  });
});
