import { HealthController } from './health.controller';
import { DatabaseService } from '../database/database.service';
import { makeAppConfig } from '../../../test/support/config';

function setup() {
  const appConfig = makeAppConfig();
  // The pool never connects: ping is stubbed.
  const db = new DatabaseService(appConfig);
  return { db, controller: new HealthController(db, appConfig) };
}

describe('HealthController', () => {
  it('reports ok when the database answers', async () => {
    const { db, controller } = setup();
    jest.spyOn(db, 'ping').mockResolvedValue(undefined);

    const res = await controller.health();
    expect(res.data.status).toBe('ok');
    expect(res.data.db.status).toBe('ok');
    expect(res.data.config.pageSize).toBe(10);
  });

  it('reports degraded without failing when the database is down', async () => {
    const { db, controller } = setup();
    jest.spyOn(db, 'ping').mockRejectedValue(new Error('connection refused'));

    const res = await controller.health();
    expect(res.data.status).toBe('degraded');
    expect(res.data.db).toMatchObject({ status: 'down', error: 'connection refused' });
  });
});
