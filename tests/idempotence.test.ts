import { describe, it, expect } from 'vitest';
import { runSequence } from '../src/sequencer/sequencer.js';
import type { Step } from '../src/sequencer/types.js';
import { FakeAssetPipeline, FakeMigrationEngine, FakePackageManager } from './helpers/fakes.js';

function provisioningSteps(
  packages: FakePackageManager,
  assets: FakeAssetPipeline,
  migrations: FakeMigrationEngine,
): Step[] {
  return [
    { name: 'install-dependencies', required: true, action: () => packages.install() },
    { name: 'collect-static-assets', required: true, action: () => assets.collect() },
    { name: 'apply-migrations', required: true, action: () => migrations.migrate() },
  ];
}

describe('re-running a completed pipeline', () => {
  it('completes again without re-mutating collaborator state', async () => {
    const packages = new FakePackageManager(['django', 'djangorestframework', 'celery']);
    const assets = new FakeAssetPipeline({ 'css/site.css': 'body{}', 'js/app.js': 'init()' });
    const migrations = new FakeMigrationEngine(['0001_initial', '0002_listing_price']);
    const steps = provisioningSteps(packages, assets, migrations);

    const first = await runSequence(steps);
    expect(first).toEqual({ type: 'completed', steps_run: 3 });
    expect(packages.mutations).toBe(3);
    expect(assets.writes).toBe(2);
    expect(migrations.mutations).toBe(2);

    const second = await runSequence(steps);
    expect(second).toEqual(first);
    expect(packages.mutations).toBe(3);
    expect(assets.writes).toBe(2);
    expect(migrations.mutations).toBe(2);
    expect(migrations.applied).toEqual(['0001_initial', '0002_listing_price']);
  });

  it('leaves partial migration effects in place and resumes on the next run', async () => {
    const packages = new FakePackageManager(['django']);
    const assets = new FakeAssetPipeline({ 'css/site.css': 'body{}' });
    const migrations = new FakeMigrationEngine(['0001_initial', '0002_booking', '0003_payment']);
    migrations.conflictOn = '0002_booking';
    const steps = provisioningSteps(packages, assets, migrations);

    const failed = await runSequence(steps);
    expect(failed).toEqual({
      type: 'failed',
      step: 'apply-migrations',
      position: 3,
      detail: 'migration conflict in 0002_booking',
    });
    // No rollback: the first migration stays applied
    expect(migrations.applied).toEqual(['0001_initial']);

    migrations.conflictOn = null;
    const retried = await runSequence(steps);
    expect(retried).toEqual({ type: 'completed', steps_run: 3 });
    expect(migrations.applied).toEqual(['0001_initial', '0002_booking', '0003_payment']);
    expect(packages.mutations).toBe(1);
    expect(assets.writes).toBe(1);
  });

  it('republishes only assets whose source changed', async () => {
    const sources: Record<string, string> = { 'css/site.css': 'body{}', 'js/app.js': 'init()' };
    const assets = new FakeAssetPipeline(sources);
    const steps: Step[] = [
      { name: 'collect-static-assets', required: true, action: () => assets.collect() },
    ];

    await runSequence(steps);
    sources['js/app.js'] = 'init(); track()';
    await runSequence(steps);

    expect(assets.writes).toBe(3);
    expect(assets.published.get('js/app.js')).toBe('init(); track()');
  });
});
