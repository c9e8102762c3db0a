import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadDefaultJobOrders } from './job-order-defaults.js';

describe('loadDefaultJobOrders', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'job-order-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled defaults for every workflow type', () => {
    const defaults = loadDefaultJobOrders();

    expect(defaults.ASGS[0]).toEqual({ recordId: 1, nextJobTypeId: 23, step: 'staging' });
    expect(defaults.ECFLOW.length).toBeGreaterThan(0);
    expect(defaults.HECRAS).toEqual([{ recordId: 201, nextJobTypeId: 21, step: 'load-geo-server' }]);
  });

  it('loads a file given by path', () => {
    const file = path.join(dir, 'order.json');
    writeFileSync(file, JSON.stringify({
      ASGS: [{ recordId: 5, nextJobTypeId: 21 }],
      ECFLOW: [{ recordId: 6, nextJobTypeId: 21 }],
      HECRAS: [{ recordId: 7, nextJobTypeId: 21 }],
    }));

    expect(loadDefaultJobOrders(file).ECFLOW).toEqual([{ recordId: 6, nextJobTypeId: 21 }]);
  });

  it('reports an unreadable file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadDefaultJobOrders(file)).toThrow(`Unable to read default job order file ${file}`);
  });

  it('reports the offending entry of an invalid file', () => {
    const file = path.join(dir, 'order.json');
    writeFileSync(file, JSON.stringify({
      ASGS: [{ recordId: 5, nextJobTypeId: 21 }],
      ECFLOW: [],
      HECRAS: [{ recordId: 7, nextJobTypeId: 21 }],
    }));

    expect(() => loadDefaultJobOrders(file)).toThrow(/Invalid default job order file .*\n {2}ECFLOW:/);
  });
});
