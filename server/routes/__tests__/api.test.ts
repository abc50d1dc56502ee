/**
 * API Route Tests
 *
 * Exercises the HTTP surface in-process with supertest.
 * Run with: npx vitest run server/routes/__tests__/api.test.ts
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import request from 'supertest';
import { afterAll, describe, it, expect } from 'vitest';
import { createApp } from '../../app';
import { loadEngineConfig } from '../../config/engineConfig';

const app = createApp(loadEngineConfig({}));

const FACTS = {
  api14: '42003012340000',
  district: '08A',
  county: { value: 'Andrews', source: 'w2' },
  surface_shoe_ft: 1200,
  production_shoe_ft: 9000,
  casing_id_in: 4.778,
  stinger_od_in: 2.375,
  formation_tops_map: { 'San Andres': 4300 },
};

interface StepBody {
  type: string;
  formation?: string;
  top_ft: number | null;
  bottom_ft: number | null;
  tag_required: boolean;
}

describe('GET /api/health', () => {
  it('reports the kernel version', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', kernel_version: '1.0.0' });
  });
});

describe('POST /api/plans/preview', () => {
  it('compiles a plan for the well location in facts', async () => {
    const res = await request(app).post('/api/plans/preview').set('X-Request-ID', 'req-test-1').send({ facts: FACTS });

    expect(res.status).toBe(200);
    expect(res.headers['x-request-id']).toBe('req-test-1');
    expect(res.body.success).toBe(true);
    expect(res.body.requestId).toBe('req-test-1');
    expect(res.body.data).toMatchObject({ policy_id: 'tx.w3a', district: '08a', county: 'Andrews' });

    const steps: StepBody[] = res.body.data.steps;
    const clearFork = steps.find((s) => s.formation === 'Clear Fork');
    expect(clearFork).toMatchObject({ type: 'formation_top_plug', top_ft: 6150, bottom_ft: 6250 });
    const shoe = steps.find((s) => s.type === 'surface_casing_shoe_plug');
    expect(shoe).toMatchObject({ top_ft: 1150, bottom_ft: 1250, tag_required: true });
  });

  it('lets the body override the location in facts', async () => {
    const res = await request(app).post('/api/plans/preview').send({ facts: FACTS, district: '7C', county: 'Reagan' });
    expect(res.status).toBe(200);
    expect(res.body.data.district).toBe('07c');
    expect(res.body.data.county).toBe('Reagan');
  });

  it('rejects a request without facts', async () => {
    const res = await request(app).post('/api/plans/preview').send({});
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
    expect(res.body.errors[0].path).toBe('facts');
  });
});

describe('merge preferences from the pack', () => {
  const packDir = fs.mkdtempSync(path.join(os.tmpdir(), 'w3a-pack-'));
  fs.writeFileSync(
    path.join(packDir, 'base.yaml'),
    [
      'policy_id: tx.w3a',
      'policy_version: merge-test',
      'base:',
      '  citations: {}',
      '  requirements: { casing_shoe_coverage_ft: 100, duqw_coverage_ft: 100, tag_wait_hours: 4 }',
      '  cement_class: { cutoff_ft: 4000, shallow_class: C, deep_class: H }',
      '  preferences:',
      '    merge_adjacent_plugs: { enabled: true, threshold_ft: 50 }',
      '    recipes:',
      '      H: { id: class_h_neat, yield_ft3_per_sk: 1.06, water_gal_per_sk: 4.3 }',
      '  formation_tops:',
      '    - { formation: Wolfcamp, plug_required: true }',
      '    - { formation: Cline, plug_required: true }',
      '',
    ].join('\n')
  );
  const packApp = createApp(
    loadEngineConfig({
      POLICY_PACK_PATH: path.join(packDir, 'base.yaml'),
      POLICY_OVERLAY_DIR: path.join(packDir, 'district_overlays'),
      COUNTY_CENTROIDS_PATH: path.join(packDir, 'county_centroids.json'),
    })
  );

  afterAll(() => {
    fs.rmSync(packDir, { recursive: true, force: true });
  });

  it('uses the pack threshold when neither the request nor the environment sets one', async () => {
    const facts = {
      surface_shoe_ft: 1200,
      casing_id_in: 4.778,
      stinger_od_in: 2.375,
      formation_tops_map: { Wolfcamp: 5000, Cline: 5200 },
    };
    const res = await request(packApp).post('/api/plans/preview').send({ facts, district: '08A' });

    expect(res.status).toBe(200);
    const plugs = res.body.data.steps.filter((s: StepBody) => s.type === 'formation_top_plug');
    expect(plugs.map((s: StepBody) => [s.formation, s.top_ft, s.bottom_ft])).toEqual([
      ['Cline', 5150, 5250],
      ['Wolfcamp', 4950, 5050],
    ]);
  });

  it('still merges when the request widens the threshold', async () => {
    const facts = {
      surface_shoe_ft: 1200,
      casing_id_in: 4.778,
      stinger_od_in: 2.375,
      formation_tops_map: { Wolfcamp: 5000, Cline: 5200 },
    };
    const res = await request(packApp)
      .post('/api/plans/preview')
      .send({ facts, district: '08A', options: { merge_threshold_ft: 100 } });

    const plugs = res.body.data.steps.filter((s: StepBody) => s.type === 'formation_top_plug');
    expect(plugs).toHaveLength(1);
    expect(plugs[0]).toMatchObject({ top_ft: 4950, bottom_ft: 5250 });
  });
});

describe('policy routes', () => {
  it('returns the effective policy', async () => {
    const res = await request(app).get('/api/policy/effective').query({ district: '08A', county: 'Andrews' });
    expect(res.status).toBe(200);
    expect(res.body.data.district).toBe('08a');
    expect(res.body.data.complete).toBe(true);
  });

  it('keeps the loaded pack when its version is unchanged', async () => {
    await request(app).get('/api/policy/effective');
    const res = await request(app).post('/api/policy/reload');
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ policy_version: '2025.1.0', previous_version: '2025.1.0', reloaded: false });
  });
});

describe('unknown routes', () => {
  it('returns 404 with the standard envelope', async () => {
    const res = await request(app).get('/api/unknown');
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ success: false, code: 'NOT_FOUND' });
  });
});
