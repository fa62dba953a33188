import fs from 'fs';
import path from 'path';
import { errorMessage } from '../core/errors.js';
import type { DeletionResult, Fixture } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { FIXTURE_SPECS } from './scenario.js';
import type { FixtureSpec } from './scenario.js';

/** Writes and removes the local upload payloads. No server interaction. */
export class FixtureProvisioner {
  constructor(
    readonly dir: string,
    private specs: readonly FixtureSpec[] = FIXTURE_SPECS,
  ) {}

  pathFor(filename: string): string {
    return path.resolve(this.dir, filename);
  }

  createAll(): Fixture[] {
    fs.mkdirSync(this.dir, { recursive: true });
    return this.specs.map((spec) => {
      const bytes = spec.generate();
      const file = this.pathFor(spec.filename);
      fs.writeFileSync(file, bytes);
      getLogger().info({ file, bytes: bytes.length }, `Fixture ${spec.filename} created`);
      return {
        contentType: spec.contentType,
        path: file,
        filename: spec.filename,
        mediaType: spec.mediaType,
        bytes,
        metadata: { ...spec.metadata },
      };
    });
  }

  // Verification compares against what is on disk, not what we meant to write
  read(fixture: Fixture): Buffer {
    return fs.readFileSync(fixture.path);
  }

  removeAll(): DeletionResult[] {
    return this.specs.map((spec): DeletionResult => {
      const file = this.pathFor(spec.filename);
      if (!fs.existsSync(file)) return { kind: 'fixture', key: file, outcome: 'absent' };
      try {
        fs.unlinkSync(file);
        getLogger().info({ file }, `Fixture ${spec.filename} removed`);
        return { kind: 'fixture', key: file, outcome: 'deleted' };
      } catch (err) {
        getLogger().warn({ err, file }, 'Failed to remove fixture');
        return { kind: 'fixture', key: file, outcome: 'failed', detail: errorMessage(err) };
      }
    });
  }
}
