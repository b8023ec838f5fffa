import {
  PrismaRawExecutor,
  PrismaTransitionAdapter,
} from '../../src/adapters/prisma-transition.adapter';

function createMockPrismaClient() {
  const queryRawUnsafe = jest.fn().mockResolvedValue([]);
  const executeRawUnsafe = jest.fn().mockResolvedValue(1);
  const txQueryRawUnsafe = jest.fn().mockResolvedValue([]);
  const txExecuteRawUnsafe = jest.fn().mockResolvedValue(1);

  const txClient = {
    $queryRawUnsafe: txQueryRawUnsafe,
    $executeRawUnsafe: txExecuteRawUnsafe,
  };

  const transaction = jest
    .fn()
    .mockImplementation(async (cb: (tx: PrismaRawExecutor) => unknown) =>
      cb(txClient as PrismaRawExecutor),
    );

  const client = {
    $queryRawUnsafe: queryRawUnsafe,
    $executeRawUnsafe: executeRawUnsafe,
    $transaction: transaction,
  };

  return {
    client,
    txClient,
    queryRawUnsafe,
    executeRawUnsafe,
    transaction,
    txQueryRawUnsafe,
    txExecuteRawUnsafe,
  };
}

describe('PrismaTransitionAdapter', () => {
  describe('updateField', () => {
    it('should update the column with positional parameters', async () => {
      const { client, executeRawUnsafe } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(client);

      await adapter.updateField({ tableName: 'orders', id: 42 }, 'state', 'Paid');

      expect(executeRawUnsafe).toHaveBeenCalledWith(
        'UPDATE orders SET state = $1 WHERE id = $2',
        'Paid',
        42,
      );
    });

    it('should throw when no row was affected', async () => {
      const { client, executeRawUnsafe } = createMockPrismaClient();
      executeRawUnsafe.mockResolvedValueOnce(0);
      const adapter = new PrismaTransitionAdapter(client);

      await expect(
        adapter.updateField({ tableName: 'orders', id: 'ord-1' }, 'state', 'Paid'),
      ).rejects.toThrow('No row with id "ord-1" in table "orders".');
    });

    it('should reject invalid column names', async () => {
      const { client, executeRawUnsafe } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(client);

      await expect(
        adapter.updateField({ tableName: 'orders', id: 1 }, 'state--', 'Paid'),
      ).rejects.toThrow('Invalid column name "state--"');
      expect(executeRawUnsafe).not.toHaveBeenCalled();
    });
  });

  describe('insertAudit', () => {
    it('should pass the audit values in column order', async () => {
      const { client, executeRawUnsafe } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(client);

      await adapter.insertAudit('state_machine_logs', {
        objectId: '42',
        objectTypeName: 'Order',
        trigger: 'pay',
        sourceState: 'Created',
        destState: 'Paid',
        actorId: '7',
      });

      const [text, ...values] = executeRawUnsafe.mock.calls[0];
      expect(text).toContain('INSERT INTO state_machine_logs');
      expect(values).toEqual(['42', 'Order', 'pay', 'Created', 'Paid', '7']);
    });
  });

  describe('findAudit', () => {
    it('should map rows into audit records', async () => {
      const { client, queryRawUnsafe } = createMockPrismaClient();
      queryRawUnsafe.mockResolvedValueOnce([
        {
          id: 'log-1',
          object_id: '42',
          object_type_name: 'Order',
          trigger_name: 'ship',
          source_state: 'Paid',
          dest_state: 'Shipped',
          actor_id: '7',
          created_at: new Date('2025-02-01T10:00:00.000Z'),
        },
      ]);
      const adapter = new PrismaTransitionAdapter(client);

      const records = await adapter.findAudit('state_machine_logs', 'Order', '42');

      expect(records).toEqual([
        {
          id: 'log-1',
          objectId: '42',
          objectTypeName: 'Order',
          trigger: 'ship',
          sourceState: 'Paid',
          destState: 'Shipped',
          actorId: '7',
          createdAt: new Date('2025-02-01T10:00:00.000Z'),
        },
      ]);
      expect(queryRawUnsafe.mock.calls[0]).toEqual([
        'SELECT id, object_id, object_type_name, trigger_name, source_state, dest_state, actor_id, created_at FROM state_machine_logs WHERE object_id = $1 AND object_type_name = $2 ORDER BY created_at, seq',
        '42',
        'Order',
      ]);
    });
  });

  describe('ensureAuditTable', () => {
    it('should execute one statement per call', async () => {
      const { client, executeRawUnsafe } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(client);

      await adapter.ensureAuditTable('state_machine_logs');

      expect(executeRawUnsafe).toHaveBeenCalledTimes(3);
      for (const call of executeRawUnsafe.mock.calls) {
        expect(call).toHaveLength(1);
      }
    });
  });

  describe('transaction', () => {
    it('should run writes on the interactive transaction client', async () => {
      const { client, transaction, executeRawUnsafe, txExecuteRawUnsafe } =
        createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(client);

      await adapter.transaction(async (tx) => {
        await tx.updateField({ tableName: 'orders', id: 1 }, 'state', 'Paid');
      });

      expect(transaction).toHaveBeenCalledTimes(1);
      expect(txExecuteRawUnsafe).toHaveBeenCalledTimes(1);
      expect(executeRawUnsafe).not.toHaveBeenCalled();
    });

    it('should run on the same client when there is no $transaction', async () => {
      const { txClient, txExecuteRawUnsafe } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(txClient);

      await adapter.transaction(async (tx) => {
        expect(tx).toBe(adapter);
        await tx.updateField({ tableName: 'orders', id: 1 }, 'state', 'Paid');
      });

      expect(txExecuteRawUnsafe).toHaveBeenCalledTimes(1);
    });

    it('should use an explicit transaction runner', async () => {
      const { txClient, transaction } = createMockPrismaClient();
      const adapter = new PrismaTransitionAdapter(txClient, {
        $transaction: transaction,
      });

      await adapter.transaction(async () => undefined);

      expect(transaction).toHaveBeenCalledTimes(1);
    });
  });
});
