/**
 * Profile Store
 * One JSON file per modality under the profile directory. A missing file
 * means "not enrolled", which is a normal state on a fresh install.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ProfileCorruptError } from '../errors.js';
import { l2Normalize } from './embedding.js';
import type { BiometricProfile, Modality } from '../types/index.js';

const profileFileSchema = z.object({
  modality: z.enum(['voice', 'face']),
  vector: z.array(z.number().finite()).min(1),
  samples: z.number().int().positive(),
  createdAt: z.number(),
});

type ProfileFile = z.infer<typeof profileFileSchema>;

const FILE_NAMES: Record<Modality, string> = {
  voice: 'voiceprint.json',
  face: 'faceprint.json',
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class ProfileStore {
  private profiles: Record<Modality, BiometricProfile | null> = { voice: null, face: null };

  constructor(private readonly dir: string) {}

  fileFor(modality: Modality): string {
    return path.join(this.dir, FILE_NAMES[modality]);
  }

  /**
   * Read both profiles from disk, replacing whatever was cached.
   */
  async load(): Promise<void> {
    this.profiles = {
      voice: await this.read('voice'),
      face: await this.read('face'),
    };
    logger.info('Profiles', 'Profiles loaded', {
      voice: this.profiles.voice !== null,
      face: this.profiles.face !== null,
    });
  }

  get(modality: Modality): BiometricProfile | null {
    return this.profiles[modality];
  }

  has(modality: Modality): boolean {
    return this.profiles[modality] !== null;
  }

  async save(profile: BiometricProfile): Promise<void> {
    const normalized: BiometricProfile = { ...profile, vector: l2Normalize(profile.vector) };
    const body: ProfileFile = {
      modality: normalized.modality,
      vector: Array.from(normalized.vector),
      samples: normalized.samples,
      createdAt: normalized.createdAt,
    };
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.fileFor(profile.modality), JSON.stringify(body), 'utf-8');
    this.profiles[profile.modality] = normalized;
    logger.info('Profiles', `Saved ${profile.modality} profile`, { samples: profile.samples });
  }

  private async read(modality: Modality): Promise<BiometricProfile | null> {
    const file = this.fileFor(modality);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        logger.info('Profiles', `No ${modality} profile enrolled; that check will be skipped`);
        return null;
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.error('Profiles', 'Ignoring unreadable profile', new ProfileCorruptError(file, err));
      return null;
    }

    const parsed = profileFileSchema.safeParse(json);
    if (!parsed.success || parsed.data.modality !== modality) {
      const issues = parsed.success ? `expected ${modality}, found ${parsed.data.modality}` : parsed.error.issues;
      logger.error('Profiles', 'Ignoring malformed profile', new ProfileCorruptError(file, issues));
      return null;
    }

    return {
      modality,
      vector: l2Normalize(parsed.data.vector),
      samples: parsed.data.samples,
      createdAt: parsed.data.createdAt,
    };
  }
}
