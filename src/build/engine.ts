import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { digestOf } from '../cache/digest.js';
import { applyLayer } from '../cache/materialize.js';
import type { Layer } from '../cache/types.js';
import { resolveOrder } from '../manifest/graph.js';
import type { Manifest } from '../manifest/types.js';
import { validateManifest } from '../manifest/validator.js';
import { getStep } from '../steps/registry.js';
import { readIgnoreFile } from '../steps/ignore.js';
import type { StepContext } from '../steps/types.js';
import { applyConfigDelta, EMPTY_CONFIG, type ImageConfig, type ImageRecord } from '../image/types.js';
import { entriesSize } from './snapshot.js';
import { cacheIgnorePatterns, type BuildContext, type StepReport } from './context.js';
import { BuildAbortedError, BuildStepError, ManifestError, ManifestValidationError, StepError } from './errors.js';

export interface BuildResult {
  buildId: string;
  image: ImageRecord;
  steps: StepReport[];
}

/**
 * Execute a build manifest step by step against the layer cache.
 *
 * Steps run strictly in order inside a private stage directory. A step's
 * layer key covers its definition, its inputs, the layers it needs and the
 * workdir and env it runs with; a cached key is replayed instead of executed. New
 * layers and the image record are only written once every step succeeded;
 * any failure discards the stage and leaves the cache as it was.
 */
export async function executeBuild(manifest: Manifest, ctx: BuildContext): Promise<BuildResult> {
  const errors = validateManifest(manifest);
  if (errors.length > 0) {
    throw new ManifestValidationError(errors.map((e) => e.message));
  }

  const order = resolveOrder(manifest);
  const buildId = randomUUID();
  const stageDir = mkdtempSync(join(ctx.cacheDir, 'stage-'));
  const ignore = [...readIgnoreFile(ctx.contextDir), ...cacheIgnorePatterns(ctx)];

  const keys = new Map<string, string>();
  const imageLayers: string[] = [];
  const fresh: Layer[] = [];
  const reports: StepReport[] = [];
  let config: ImageConfig = { ...EMPTY_CONFIG, env: { ...ctx.env } };
  let baseKey = '';

  const report = (entry: StepReport): void => {
    reports.push(entry);
    ctx.onStep?.(entry);
  };

  ctx.log.logBuildStarted(buildId, manifest.id, order.length);

  try {
    for (const name of order) {
      if (ctx.signal?.aborted) {
        ctx.log.logBuildAborted(buildId, name);
        throw new BuildAbortedError(name);
      }

      const decl = manifest.steps.get(name);
      if (!decl) throw new ManifestError(`Step "${name}" is not declared`);
      const step = getStep(decl.kind);

      if (decl.kind === 'install_browser' && !ctx.installBrowser) {
        const description = step.describe(decl.properties);
        ctx.log.logStepSkipped(buildId, name, decl.kind, 'install_browser disabled');
        report({ name, kind: decl.kind, status: 'skipped', layerKey: null, description });
        continue;
      }

      const stepCtx: StepContext = {
        contextDir: ctx.contextDir,
        stageDir,
        workdir: config.workdir,
        env: { ...config.env },
        runner: ctx.runner,
        blobs: ctx.blobs,
        ignore,
        signal: ctx.signal,
      };

      try {
        const description = step.describe(decl.properties);
        await step.verify(decl.properties, stepCtx);
        const key = digestOf({
          kind: decl.kind,
          properties: decl.properties,
          inputs: step.inputs(decl.properties, stepCtx),
          needs: decl.needs.map((need) => keys.get(need) ?? null),
          base: baseKey,
          workdir: stepCtx.workdir,
          env: stepCtx.env,
        });

        const cached = ctx.noCache ? null : ctx.layers.get(key);
        if (cached) {
          applyLayer(cached, stageDir, ctx.blobs);
          config = applyConfigDelta(config, cached.config);
          ctx.log.logStepCached(buildId, name, decl.kind, key);
          report({ name, kind: decl.kind, status: 'cached', layerKey: key, description });
        } else {
          const started = Date.now();
          const output = await step.execute(decl.properties, stepCtx);
          const layer: Layer = {
            key,
            step: name,
            kind: decl.kind,
            description,
            entries: output.entries,
            config: output.config ?? {},
            size: entriesSize(output.entries),
          };
          fresh.push(layer);
          config = applyConfigDelta(config, layer.config);
          ctx.log.logStepExecuted(buildId, name, decl.kind, key, Date.now() - started);
          report({ name, kind: decl.kind, status: 'executed', layerKey: key, description });
        }

        keys.set(name, key);
        imageLayers.push(key);
        if (decl.kind === 'base_image') baseKey = key;
      } catch (err) {
        if (ctx.signal?.aborted) {
          ctx.log.logBuildAborted(buildId, name);
          throw new BuildAbortedError(name, true);
        }
        const category = err instanceof StepError ? err.category : step.failure;
        const failure = new BuildStepError(name, decl.kind, category, err);
        ctx.log.logBuildFailed(buildId, name, category, failure.message);
        throw failure;
      }
    }

    const id = digestOf({ layers: imageLayers, config });
    ctx.layers.commit(fresh);
    const image = ctx.images.save({ id, tag: manifest.tag, manifestId: manifest.id, layers: imageLayers, config });

    const executed = reports.filter((r) => r.status === 'executed').length;
    const cachedCount = reports.filter((r) => r.status === 'cached').length;
    ctx.log.logBuildCompleted(buildId, id, manifest.tag, executed, cachedCount);

    return { buildId, image, steps: reports };
  } finally {
    rmSync(stageDir, { recursive: true, force: true });
  }
}
