import { InMemoryDirectoryClient } from './inmemory-directory.client';
import { DirectoryObjectNotFoundError } from '../../../domain/directory/directory-errors';

describe('InMemoryDirectoryClient', () => {
  let client: InMemoryDirectoryClient;

  beforeEach(() => {
    client = new InMemoryDirectoryClient()
      .addUser({ id: 'u1', displayName: 'Alice', userPrincipalName: 'alice@example.test' })
      .addServicePrincipal({ id: 'sp1', displayName: 'Backup Agent' })
      .addDevice({ id: 'd1', displayName: 'PC-01' }, [{ id: 'u1', kind: 'user' }])
      .addGroup({ id: 'g1', displayName: 'Sales' }, [
        { id: 'u1', kind: 'user' },
        { id: 'd1', kind: 'device' },
      ]);
  });

  // ─── lookups ───────────────────────────────────────────────────────

  it('should return stored profiles', async () => {
    await expect(client.getUser('u1')).resolves.toEqual({
      id: 'u1',
      displayName: 'Alice',
      userPrincipalName: 'alice@example.test',
    });
    await expect(client.getDevice('d1')).resolves.toEqual({ id: 'd1', displayName: 'PC-01' });
    await expect(client.getServicePrincipal('sp1')).resolves.toEqual({ id: 'sp1', displayName: 'Backup Agent' });
    await expect(client.getGroup('g1')).resolves.toEqual({ id: 'g1', displayName: 'Sales' });
  });

  it('should reject missing objects with DirectoryObjectNotFoundError', async () => {
    await expect(client.getUser('nope')).rejects.toBeInstanceOf(DirectoryObjectNotFoundError);
    await expect(client.getGroup('nope')).rejects.toMatchObject({ objectKind: 'group', objectId: 'nope' });
    await expect(client.getGroupMembers('nope')).rejects.toMatchObject({ objectKind: 'group' });
    await expect(client.getDeviceRegisteredOwners('nope')).rejects.toMatchObject({ objectKind: 'device' });
  });

  it('should not look up objects of another kind', async () => {
    await expect(client.getDevice('u1')).rejects.toThrow('Directory device u1 not found');
  });

  // ─── listings ──────────────────────────────────────────────────────

  it('should return members in insertion order', async () => {
    await expect(client.getGroupMembers('g1')).resolves.toEqual([
      { id: 'u1', kind: 'user' },
      { id: 'd1', kind: 'device' },
    ]);
  });

  it('should return device owners', async () => {
    await expect(client.getDeviceRegisteredOwners('d1')).resolves.toEqual([{ id: 'u1', kind: 'user' }]);
  });

  it('should return detached copies', async () => {
    const members = await client.getGroupMembers('g1');
    members.pop();
    const user = await client.getUser('u1');
    user.displayName = 'MUTATED';

    expect(await client.getGroupMembers('g1')).toHaveLength(2);
    expect((await client.getUser('u1')).displayName).toBe('Alice');
  });

  // ─── getGroupByName ────────────────────────────────────────────────

  it('should find a group by exact display name', async () => {
    await expect(client.getGroupByName('Sales')).resolves.toEqual({ id: 'g1', displayName: 'Sales' });
    await expect(client.getGroupByName('sales')).resolves.toBeNull();
  });

  // ─── load / clear ──────────────────────────────────────────────────

  it('should load a snapshot on top of existing data', async () => {
    client.load({
      users: [{ id: 'u2', displayName: 'Bob', userPrincipalName: 'bob@example.test' }],
      devices: [{ id: 'd2', displayName: 'PC-02', owners: [{ id: 'u2', kind: 'user' }] }],
      servicePrincipals: [],
      groups: [{ id: 'g2', displayName: 'Ops', members: [{ id: 'g1', kind: 'group' }] }],
    });

    await expect(client.getUser('u1')).resolves.toBeDefined();
    await expect(client.getDevice('d2')).resolves.toEqual({ id: 'd2', displayName: 'PC-02' });
    await expect(client.getDeviceRegisteredOwners('d2')).resolves.toEqual([{ id: 'u2', kind: 'user' }]);
    await expect(client.getGroupMembers('g2')).resolves.toEqual([{ id: 'g1', kind: 'group' }]);
  });

  it('clear should remove everything', async () => {
    client.clear();
    await expect(client.getGroup('g1')).rejects.toBeInstanceOf(DirectoryObjectNotFoundError);
    await expect(client.getGroupByName('Sales')).resolves.toBeNull();
  });
});
