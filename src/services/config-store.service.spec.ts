import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../common/errors/domain.errors';
import { SECURITY_SETTINGS } from '../config/security.config';
import { ConfigEntry, ConfigValueType } from '../entities/config-entry.entity';
import { ConfigChangeType, ConfigHistory } from '../entities/config-history.entity';
import { Namespace } from '../entities/namespace.entity';
import { Tenant } from '../entities/tenant.entity';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { testSecuritySettings } from '../../test/support/security-settings';
import { ConfigHistoryService } from './config-history.service';
import { ConfigStoreService } from './config-store.service';
import { EncryptionService } from './encryption.service';
import { MetricsService } from './metrics.service';

describe('ConfigStoreService', () => {
  let store: ConfigStoreService;
  let history: ConfigHistoryService;
  let encryption: EncryptionService;
  let metrics: MetricsService;
  let dataSource: InMemoryDataSource;
  let namespace: Namespace;

  const actorId = '00000000-0000-4000-8000-000000000001';

  beforeEach(async () => {
    dataSource = new InMemoryDataSource([Tenant, Namespace, ConfigEntry, ConfigHistory]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConfigStoreService,
        ConfigHistoryService,
        EncryptionService,
        MetricsService,
        { provide: SECURITY_SETTINGS, useValue: testSecuritySettings() },
        { provide: DataSource, useValue: dataSource },
        {
          provide: getRepositoryToken(ConfigEntry),
          useValue: dataSource.getRepository(ConfigEntry),
        },
        {
          provide: getRepositoryToken(ConfigHistory),
          useValue: dataSource.getRepository(ConfigHistory),
        },
      ],
    }).compile();

    store = module.get(ConfigStoreService);
    history = module.get(ConfigHistoryService);
    encryption = module.get(EncryptionService);
    metrics = module.get(MetricsService);

    const tenants = dataSource.getRepository(Tenant);
    const tenant = await tenants.save(tenants.create({ name: 'acme', settings: {} }));
    const namespaces = dataSource.getRepository(Namespace);
    namespace = await namespaces.save(
      namespaces.create({ tenant_id: tenant.id, name: 'prod', description: null }),
    );
  });

  const createAppName = () =>
    store.create(
      namespace,
      { key: 'app_name', value: 'App', value_type: ConfigValueType.STRING },
      actorId,
    );

  describe('create', () => {
    it('stores version 1 encrypted, with a CREATE history record', async () => {
      const view = await createAppName();

      expect(view).toMatchObject({
        key: 'app_name',
        value: 'App',
        value_type: ConfigValueType.STRING,
        version: 1,
        is_secret: false,
        created_by: actorId,
      });

      const [row] = dataSource.getRepository(ConfigEntry).all();
      expect(row.value).not.toBe('App');
      expect(encryption.decrypt(row.value)).toBe('App');

      const records = await store.getHistory(namespace, 'app_name');
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        version: 1,
        change_type: ConfigChangeType.CREATE,
        value: 'App',
        changed_by: actorId,
      });
    });

    it('rejects a duplicate key in the same namespace', async () => {
      await createAppName();
      await expect(createAppName()).rejects.toThrow(
        new ConflictError('Configuration with this key already exists'),
      );
      expect(dataSource.getRepository(ConfigHistory).all()).toHaveLength(1);
    });

    it('validates before writing anything', async () => {
      await expect(
        store.create(
          namespace,
          {
            key: 'port',
            value: 70000,
            value_type: ConfigValueType.NUMBER,
            validation_schema: { max_value: 65535 },
          },
          actorId,
        ),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(dataSource.getRepository(ConfigEntry).all()).toHaveLength(0);
    });

    it('keeps JSON documents structured', async () => {
      const view = await store.create(
        namespace,
        { key: 'limits', value: { rps: 10, burst: [1, 2] }, value_type: ConfigValueType.JSON },
        null,
      );
      expect(view.value).toEqual({ rps: 10, burst: [1, 2] });
      expect((await store.get(namespace, 'limits')).value).toEqual({ rps: 10, burst: [1, 2] });
    });
  });

  describe('update', () => {
    it('bumps the version once per value change and lists history newest first', async () => {
      await createAppName();
      await store.update(namespace, 'app_name', { value: 'App2' }, actorId);
      await store.update(namespace, 'app_name', { value: 'App3' }, actorId);
      const view = await store.update(namespace, 'app_name', { value: 'App4' }, actorId);

      expect(view.version).toBe(4);
      expect(view.value).toBe('App4');

      const records = await store.getHistory(namespace, 'app_name');
      expect(records.map((r) => r.version)).toEqual([4, 3, 2, 1]);
      expect(records.map((r) => r.value)).toEqual(['App4', 'App3', 'App2', 'App']);
      expect(records.map((r) => r.change_type)).toEqual([
        ConfigChangeType.UPDATE,
        ConfigChangeType.UPDATE,
        ConfigChangeType.UPDATE,
        ConfigChangeType.CREATE,
      ]);
    });

    it('keeps the version when the value is unchanged or only metadata moves', async () => {
      await createAppName();
      const same = await store.update(namespace, 'app_name', { value: 'App' }, actorId);
      expect(same.version).toBe(1);

      const described = await store.update(
        namespace,
        'app_name',
        { description: 'Display name', is_secret: true },
        actorId,
      );
      expect(described).toMatchObject({ version: 1, description: 'Display name', is_secret: true });
      expect(await store.getHistory(namespace, 'app_name')).toHaveLength(1);
    });

    it('reinterprets the stored text when only the type changes', async () => {
      await store.create(
        namespace,
        { key: 'workers', value: '42', value_type: ConfigValueType.STRING },
        actorId,
      );
      const view = await store.update(
        namespace,
        'workers',
        { value_type: ConfigValueType.NUMBER },
        actorId,
      );
      expect(view).toMatchObject({ value: 42, value_type: ConfigValueType.NUMBER, version: 2 });
    });

    it('keeps validating against a json_schema with an $id across writes and entries', async () => {
      const validation_schema = {
        json_schema: {
          $id: 'https://example.test/limits.json',
          type: 'object',
          required: ['rps'],
          properties: { rps: { type: 'integer' } },
        },
      };
      await store.create(
        namespace,
        { key: 'limits', value: { rps: 10 }, value_type: ConfigValueType.JSON, validation_schema },
        actorId,
      );
      const view = await store.update(namespace, 'limits', { value: { rps: 20 } }, actorId);
      expect(view).toMatchObject({ value: { rps: 20 }, version: 2 });

      const other = await store.create(
        namespace,
        {
          key: 'limits_eu',
          value: { rps: 5 },
          value_type: ConfigValueType.JSON,
          validation_schema: structuredClone(validation_schema),
        },
        actorId,
      );
      expect(other.version).toBe(1);
      await expect(
        store.update(namespace, 'limits', { value: { rps: 'fast' } }, actorId),
      ).rejects.toThrow(new ValidationError('Value does not satisfy json_schema'));
    });

    it('re-validates the current value against a new schema', async () => {
      await createAppName();
      await expect(
        store.update(namespace, 'app_name', { validation_schema: { min_length: 5 } }, actorId),
      ).rejects.toThrow(new ValidationError('Value must be at least 5 characters'));
    });

    it('fails with CONCURRENT_MODIFICATION when the version moved underneath', async () => {
      const created = await createAppName();
      const realEncrypt = encryption.encrypt.bind(encryption);
      jest.spyOn(encryption, 'encrypt').mockImplementationOnce((plaintext) => {
        void dataSource.getRepository(ConfigEntry).update({ id: created.id }, { version: 2 });
        return realEncrypt(plaintext);
      });

      const attempt = store.update(namespace, 'app_name', { value: 'App2' }, actorId);
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({ code: 'CONCURRENT_MODIFICATION' });
      expect(dataSource.getRepository(ConfigHistory).all()).toHaveLength(1);
    });

    it('rolls the entry back when the history write fails', async () => {
      await createAppName();
      jest.spyOn(history, 'append').mockRejectedValueOnce(new Error('history unavailable'));

      await expect(
        store.update(namespace, 'app_name', { value: 'App2' }, actorId),
      ).rejects.toThrow('history unavailable');

      const current = await store.get(namespace, 'app_name');
      expect(current).toMatchObject({ value: 'App', version: 1 });
    });

    it('lets a new value replace one that no longer decrypts', async () => {
      const created = await createAppName();
      await dataSource
        .getRepository(ConfigEntry)
        .update({ id: created.id }, { value: 'corrupted-value' });

      const view = await store.update(namespace, 'app_name', { value: 'Fresh' }, actorId);
      expect(view).toMatchObject({ value: 'Fresh', version: 2 });
    });

    it('returns NOT_FOUND for an unknown key', async () => {
      await expect(
        store.update(namespace, 'missing', { value: 'x' }, actorId),
      ).rejects.toThrow(new NotFoundError('Configuration'));
    });
  });

  describe('delete', () => {
    it('removes the entry and leaves a DELETE record behind', async () => {
      const created = await createAppName();
      await store.update(namespace, 'app_name', { value: 'App2' }, actorId);
      await store.delete(namespace, 'app_name', actorId);

      await expect(store.get(namespace, 'app_name')).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.getHistory(namespace, 'app_name')).rejects.toBeInstanceOf(NotFoundError);

      const records = await history.listForEntry(created.id);
      expect(records.map((r) => [r.version, r.change_type])).toEqual([
        [2, ConfigChangeType.DELETE],
        [2, ConfigChangeType.UPDATE],
        [1, ConfigChangeType.CREATE],
      ]);
    });
  });

  it('lists entries in creation order', async () => {
    await createAppName();
    await store.create(
      namespace,
      { key: 'color', value: 'red', value_type: ConfigValueType.SELECT },
      actorId,
    );
    const entries = await store.list(namespace);
    expect(entries.map((e) => e.key)).toEqual(['app_name', 'color']);
  });

  it('counts committed mutations by change type', async () => {
    await createAppName();
    await store.update(namespace, 'app_name', { value: 'App2' }, actorId);
    await store.update(namespace, 'app_name', { value: 'App2' }, actorId);

    const { values } = await metrics.configMutationsTotal.get();
    const byType = Object.fromEntries(values.map((v) => [String(v.labels.change_type), v.value]));
    expect(byType).toEqual({ create: 1, update: 1 });
  });
});
