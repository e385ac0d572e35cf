/**
 * Archive Packager
 *
 * Stages a cup's artifacts under the filedrop directory and bundles them
 * into `<filedrop>/<codename>.zip` with a single top-level `<codename>/`
 * folder, ready to be fetched from `<baseUri>/<codename>.zip`.
 *
 * @module distribution/archive-packager
 */

import { cpSync, existsSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { NotFoundError } from '../core/errors.js';
import { silentLogger, type ArtifactGroup, type DiagnosticLogger } from '../core/types.js';
import { assertCodename, type CupStore } from '../store/cup-store.js';

export interface PackagerOptions {
  /** Directory archives are staged and published in */
  readonly filedrop: string;
  /** Public URI of the filedrop directory */
  readonly baseUri: string;
  readonly logger?: DiagnosticLogger;
}

export interface PackageResult {
  readonly codename: string;
  readonly stagingDir: string;
  readonly archivePath: string;
  readonly url: string;
  readonly included: readonly ArtifactGroup[];
}

export class ArchivePackager {
  private readonly logger: DiagnosticLogger;

  constructor(
    private readonly store: CupStore,
    private readonly options: PackagerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws NotFoundError if the definition or rankings subtree is missing
   */
  package(codename: string): PackageResult {
    const cup = assertCodename(codename);
    const definition = this.store.resolveForRead(cup, { kind: 'definition' });
    const rankings = this.store.rankingsDir(cup);
    if (!existsSync(rankings)) {
      throw new NotFoundError(`No rankings for cup '${cup}' at ${rankings}`, rankings);
    }

    const stagingDir = join(this.options.filedrop, cup);
    rmSync(stagingDir, { recursive: true, force: true });
    mkdirSync(stagingDir, { recursive: true });

    const included: ArtifactGroup[] = [];
    const stage = (group: ArtifactGroup, from: string, to: string): void => {
      cpSync(from, join(stagingDir, to), { recursive: true });
      included.push(group);
    };

    stage('rankings', rankings, join('rankings', cup));
    stage('definition', definition, join('cupfile', `${cup}.json`));

    const overrides = this.store.overridesDir(cup);
    if (existsSync(overrides)) {
      stage('overrides', overrides, join('overrides', cup));
    } else {
      this.logger.warn(`No overrides for cup '${cup}'; archive will not include them`, { path: overrides });
    }

    const group = this.store.pathFor(cup, { kind: 'group' });
    if (existsSync(group)) {
      stage('group', group, join('group', `${cup}.json`));
    } else {
      this.logger.warn(`No group record for cup '${cup}'; archive will not include it`, { path: group });
    }

    const archivePath = join(this.options.filedrop, `${cup}.zip`);
    const zip = new AdmZip();
    zip.addLocalFolder(stagingDir, cup);
    zip.writeZip(archivePath);

    const url = `${this.options.baseUri.replace(/\/+$/, '')}/${cup}.zip`;
    this.logger.info(`Packaged cup '${cup}'`, { archivePath, url, included });

    return { codename: cup, stagingDir, archivePath, url, included };
  }
}
