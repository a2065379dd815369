import request from 'supertest';
import { describe, expect, it } from 'vitest';

import { createApp } from '../app.js';
import { makeSession } from './utils/sessionFixtures.js';

async function seededApp() {
  const ctx = makeSession();
  const app = createApp(ctx.session);
  await request(app).post('/parts/masters').send({ partNumber: 'PN-1001', description: 'Main Bearing' }).expect(201);
  await request(app).post('/parts/instances').send({ partNumber: 'PN-1001', serialNumber: 'PI-SN-001' }).expect(201);
  await request(app)
    .post('/turbines')
    .send({ serialNumber: 'T-SN-101', frameType: 'GE 1.5sle', location: 'Wind Farm Alpha' })
    .expect(201);
  return { app, ...ctx };
}

describe('backend routes', () => {
  it('GET /health returns collection counts', async () => {
    const { app } = await seededApp();
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.counts).toEqual({
      turbines: 1,
      part_masters: 1,
      part_instances: 1,
      installation_records: 0,
      maintenance_logs: 0,
    });
  });

  it('installs and removes a part through the API', async () => {
    const { app, store } = await seededApp();

    const installed = await request(app)
      .post('/parts/instances/PI-SN-001/install')
      .send({ turbineSerialNumber: 'T-SN-101', installationDate: '2024-03-01' });
    expect(installed.status).toBe(201);
    expect(installed.body.record.installation_id).toBe(1);

    const again = await request(app).post('/parts/instances/PI-SN-001/install').send({ turbineSerialNumber: 'T-SN-101' });
    expect(again.status).toBe(409);
    expect(again.body.error).toBe('already_installed');

    const parts = await request(app).get('/turbines/T-SN-101/parts');
    expect(parts.body.parts.map((p: { serial_number: string }) => p.serial_number)).toEqual(['PI-SN-001']);

    const removed = await request(app)
      .post('/parts/instances/PI-SN-001/remove')
      .send({ removalDate: '2024-04-01', turbineHours: 250, turbineStarts: 12 });
    expect(removed.status).toBe(200);
    expect(removed.body.record.removal_date).toBe('2024-04-01');
    expect(removed.body.turbine.current_total_hours).toBe(250);

    const emptied = await request(app).get('/turbines/T-SN-101/parts');
    expect(emptied.body.parts).toEqual([]);

    const secondRemove = await request(app).post('/parts/instances/PI-SN-001/remove');
    expect(secondRemove.status).toBe(409);
    expect(secondRemove.body).toEqual({
      ok: false,
      error: 'no_active_installation',
      message: 'part PI-SN-001 has no active installation',
    });
    expect(store.saveCount).toBe(5);
  });

  it('returns the lifecycle and turbine history', async () => {
    const { app } = await seededApp();
    await request(app)
      .post('/parts/instances/PI-SN-001/install')
      .send({ turbineSerialNumber: 'T-SN-101', installationDate: '2024-03-01' })
      .expect(201);
    await request(app)
      .post('/parts/instances/PI-SN-001/maintenance')
      .send({ description: 'Initial inspection complete.', logDate: '2024-03-02' })
      .expect(201);

    const lifecycle = await request(app).get('/parts/instances/PI-SN-001/lifecycle');
    expect(lifecycle.status).toBe(200);
    expect(lifecycle.body.lifecycle.partMaster.part_number).toBe('PN-1001');
    expect(lifecycle.body.lifecycle.installations).toHaveLength(1);
    expect(lifecycle.body.lifecycle.maintenanceLogs[0].description).toBe('Initial inspection complete.');

    const history = await request(app).get('/turbines/T-SN-101/history');
    expect(history.status).toBe(200);
    expect(history.body.history[0].instance.serial_number).toBe('PI-SN-001');
  });

  it('maps not-found and conflicts to 404 and 409', async () => {
    const { app } = await seededApp();

    const missingPart = await request(app).get('/parts/instances/NOPE/lifecycle');
    expect(missingPart.status).toBe(404);
    expect(missingPart.body.error).toBe('part_not_found');

    const missingTurbine = await request(app).post('/parts/instances/PI-SN-001/install').send({ turbineSerialNumber: 'T-404' });
    expect(missingTurbine.status).toBe(404);
    expect(missingTurbine.body.error).toBe('turbine_not_found');

    expect((await request(app).get('/turbines/T-404')).status).toBe(404);

    const duplicate = await request(app).post('/turbines').send({ serialNumber: 'T-SN-101', frameType: '7FA' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.error).toBe('duplicate_key');
  });

  it('rejects invalid bodies with 400', async () => {
    const { app, store } = await seededApp();

    const badDate = await request(app)
      .post('/parts/instances/PI-SN-001/install')
      .send({ turbineSerialNumber: 'T-SN-101', installationDate: '03/01/2024' });
    expect(badDate.status).toBe(400);
    expect(badDate.body.error).toBe('invalid_input');

    const badJson = await request(app).post('/turbines').set('Content-Type', 'application/json').send('{"serialNumber":');
    expect(badJson.status).toBe(400);
    expect(badJson.body.error).toBe('invalid_json');

    expect(store.saveCount).toBe(3);
  });

  it('lists turbines and locations', async () => {
    const { app } = await seededApp();
    await request(app).post('/turbines').send({ serialNumber: 'T-SN-102', frameType: '7FA', location: 'Coastal' }).expect(201);

    const locations = await request(app).get('/locations');
    expect(locations.status).toBe(200);
    expect(locations.body.locations).toEqual(['Coastal', 'Wind Farm Alpha']);

    const filtered = await request(app).get('/turbines').query({ location: 'Coastal' });
    expect(filtered.body.turbines.map((t: { serial_number: string }) => t.serial_number)).toEqual(['T-SN-102']);
  });

  it('fetches a turbine whose serial number is "locations"', async () => {
    const { app } = await seededApp();
    await request(app).post('/turbines').send({ serialNumber: 'locations', frameType: '7FA' }).expect(201);

    const res = await request(app).get('/turbines/locations');
    expect(res.status).toBe(200);
    expect(res.body.turbine.serial_number).toBe('locations');
    expect(res.body.turbine.turbine_id).toBe(2);
  });

  it('answers 500 with the store error code when saving fails', async () => {
    const { app, store, session } = await seededApp();
    store.failNextSave = true;

    const res = await request(app).post('/parts/instances/PI-SN-001/install').send({ turbineSerialNumber: 'T-SN-101' });
    expect(res.status).toBe(500);
    expect(res.body.error).toBe('store_unwritable');
    expect(session.document.installation_records).toEqual([]);
  });
});
