import type { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './helpers/app.helper';
import { getAdminToken } from './helpers/auth.helper';

/**
 * E2E tests for the group membership API against the seeded in-memory directory.
 *
 * Directory layout (test/fixtures/directory-snapshot.json):
 *   Engineering (g-eng)     → Alice, Platform Team, CI Pipeline, LAPTOP-01
 *   Platform Team           → Alice, Bob, BUILD-01, Engineering (cycle)
 *   Stale, "Legacy" Group   → Bob, u-deleted (missing)
 *   Empty Group             → (no members)
 */
describe('Group Membership API (E2E)', () => {
  let app: INestApplication;
  const token = getAdminToken();

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  // ─── GET /api/groups/:groupId/members ─────────────────────────────

  describe('GET /api/groups/:groupId/members', () => {
    it('should flatten nested groups, break the cycle and deduplicate', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-eng/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body).toEqual({
        group: { id: 'g-eng', displayName: 'Engineering' },
        totalResults: 6,
        traversedGroups: 2,
        skipped: [],
        members: [
          { id: 'g-platform', name: 'Platform Team', kind: 'Group', userPrincipalName: '', primaryUser: '' },
          { id: 'u-alice', name: 'Alice Example', kind: 'User', userPrincipalName: 'alice@example.test', primaryUser: '' },
          { id: 'u-bob', name: 'Bob Example', kind: 'User', userPrincipalName: 'bob@example.test', primaryUser: '' },
          {
            id: 'd-build',
            name: 'BUILD-01',
            kind: 'Device',
            userPrincipalName: '',
            primaryUser: 'alice@example.test, bob@example.test',
          },
          { id: 'sp-ci', name: 'CI Pipeline', kind: 'ServicePrincipal', userPrincipalName: '', primaryUser: '' },
          { id: 'd-laptop1', name: 'LAPTOP-01', kind: 'Device', userPrincipalName: '', primaryUser: 'alice@example.test' },
        ],
      });
    });

    it('should not list the root group when resolving from the other side of the cycle', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-platform/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      const ids: string[] = res.body.members.map((m: { id: string }) => m.id);
      expect(ids).not.toContain('g-platform');
      // emitted: alice, bob, build, g-eng, alice, ci, laptop1
      expect(ids).toEqual(['u-bob', 'd-build', 'g-eng', 'u-alice', 'sp-ci', 'd-laptop1']);
    });

    it('should return an empty member list for a group without members', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-empty/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.totalResults).toBe(0);
      expect(res.body.members).toEqual([]);
    });

    it('should skip members the directory no longer has', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-stale/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.members.map((m: { id: string }) => m.id)).toEqual(['u-bob']);
      expect(res.body.skipped).toEqual([
        { id: 'u-deleted', kind: 'user', parentId: 'g-stale', reason: 'Directory user u-deleted not found' },
      ]);
    });

    it('should return 404 in the error envelope for an unknown group', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-missing/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(404);

      expect(res.body).toEqual({ status: '404', error: 'Not Found', detail: 'Group g-missing not found.' });
    });

    it('should return 400 for an unsupported format', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-eng/members?format=xml')
        .set('Authorization', `Bearer ${token}`)
        .expect(400);

      expect(res.body).toEqual({
        status: '400',
        error: 'Bad Request',
        detail: "Unsupported format 'xml'. Use one of: json, csv.",
      });
    });
  });

  // ─── CSV export ───────────────────────────────────────────────────

  describe('format=csv', () => {
    it('should download the members as CSV', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/g-stale/members?format=csv')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toMatch(
        /^attachment; filename="Stale___Legacy__Group-members-\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.csv"$/,
      );
      expect(res.text).toBe(
        'Name,Kind,UserPrincipalName,PrimaryUser,Id\r\n' + 'Bob Example,User,bob@example.test,,u-bob\r\n',
      );
    });
  });

  // ─── GET /api/groups/by-name/:groupName/members ───────────────────

  describe('GET /api/groups/by-name/:groupName/members', () => {
    it('should resolve a group by display name', async () => {
      const res = await request(app.getHttpServer())
        .get(`/api/groups/by-name/${encodeURIComponent('Platform Team')}/members`)
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.group).toEqual({ id: 'g-platform', displayName: 'Platform Team' });
      expect(res.body.totalResults).toBe(6);
    });

    it('should return 404 for an unknown name', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/groups/by-name/Nobody/members')
        .set('Authorization', `Bearer ${token}`)
        .expect(404);

      expect(res.body.detail).toBe("Group 'Nobody' not found.");
    });
  });

  // ─── Correlation ──────────────────────────────────────────────────

  describe('request correlation', () => {
    it('should tag skip warnings with the request id', async () => {
      await request(app.getHttpServer())
        .get('/api/groups/g-stale/members')
        .set('Authorization', `Bearer ${token}`)
        .set('X-Request-Id', 'e2e-stale-request')
        .expect(200);

      const res = await request(app.getHttpServer())
        .get('/api/admin/log-config/recent?requestId=e2e-stale-request&category=membership&level=WARN')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.count).toBe(1);
      expect(res.body.entries[0]).toMatchObject({
        level: 'WARN',
        category: 'membership',
        message: 'Skipping unresolvable directory object',
        requestId: 'e2e-stale-request',
        groupId: 'g-stale',
      });
    });
  });
});
