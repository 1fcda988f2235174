import { pipelineSchema, type Pipeline } from './types.js';

export interface CatalogEntry {
  description: string;
  run: string;
}

/** Built-in steps a pipeline can reference with `uses` */
export const STEP_CATALOG: ReadonlyMap<string, CatalogEntry> = new Map([
  [
    'install-dependencies',
    {
      description: 'Install the declared dependency manifest',
      run: 'pip install -r requirements.txt && pip install --upgrade pip',
    },
  ],
  [
    'collect-static-assets',
    {
      description: 'Publish static assets to the serving location',
      run: 'python manage.py collectstatic --no-input',
    },
  ],
  [
    'create-admin-user',
    {
      description: 'Create the admin user if none exists',
      run: 'python manage.py initadmin',
    },
  ],
  [
    'apply-migrations',
    {
      description: 'Apply outstanding schema migrations',
      run: 'python manage.py migrate',
    },
  ],
]);

/** Pipeline used when no configuration file is present */
export function defaultPipeline(): Pipeline {
  return pipelineSchema.parse({
    name: 'deploy',
    description: 'Install dependencies, collect static assets, apply migrations',
    steps: [
      'install-dependencies',
      'collect-static-assets',
      { uses: 'create-admin-user', enabled: false },
      'apply-migrations',
    ],
  });
}
