/**
 * Vigil Configuration
 * Load from environment variables with defaults
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const ROOT_DIR = resolve(__dirname, '../../..');

// Load .env from project root
config({ path: resolve(ROOT_DIR, '.env') });

function intEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

function pathEnv(name: string, fallback: string): string {
  const value = process.env[name];
  if (value === '') return '';
  return resolve(ROOT_DIR, value || fallback);
}

export const ENV = {
  // Owner
  OWNER_NAME: process.env.OWNER_NAME || 'Owner',
  WAKE_PHRASE: process.env.WAKE_PHRASE || 'vigil',

  // Microphone
  MIC_SAMPLE_RATE: intEnv('MIC_SAMPLE_RATE', 16000),
  WAKE_FRAME_LENGTH: intEnv('WAKE_FRAME_LENGTH', 512),
  COMMAND_DURATION_SEC: floatEnv('COMMAND_DURATION_SEC', 3),

  // Identity
  VOICE_THRESHOLD: floatEnv('VOICE_THRESHOLD', 0.75),
  FACE_THRESHOLD: floatEnv('FACE_THRESHOLD', 0.8),
  FACE_MAX_ATTEMPTS: intEnv('FACE_MAX_ATTEMPTS', 10),
  FACE_FRAME_TIMEOUT_MS: intEnv('FACE_FRAME_TIMEOUT_MS', 1000),
  ENROLL_VOICE_SAMPLES: intEnv('ENROLL_VOICE_SAMPLES', 5),
  ENROLL_FACE_FRAMES: intEnv('ENROLL_FACE_FRAMES', 10),
  PROFILE_DIR: pathEnv('PROFILE_DIR', 'data'),

  // Camera monitor
  CAMERA_DARK_THRESHOLD: floatEnv('CAMERA_DARK_THRESHOLD', 60),
  CAMERA_DARK_FRAMES: intEnv('CAMERA_DARK_FRAMES', 5),
  CAMERA_MAX_FAILURES: intEnv('CAMERA_MAX_FAILURES', 10),
  CAMERA_POLL_MS: intEnv('CAMERA_POLL_MS', 200),
  CAMERA_RETRY_MS: intEnv('CAMERA_RETRY_MS', 100),

  // Speech
  SPEECH_SHUTDOWN_GRACE_MS: intEnv('SPEECH_SHUTDOWN_GRACE_MS', 300),
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  STT_MODEL: process.env.STT_MODEL || 'whisper-1',
  STT_TIMEOUT_MS: intEnv('STT_TIMEOUT_MS', 30000),
  STT_URL: 'https://api.openai.com/v1/audio/transcriptions',

  // Idle prompts
  IDLE_PROMPTS: process.env.IDLE_PROMPTS !== 'false',
  IDLE_PROMPT_MIN_SEC: intEnv('IDLE_PROMPT_MIN_SEC', 60),
  IDLE_PROMPT_MAX_SEC: intEnv('IDLE_PROMPT_MAX_SEC', 180),

  // Timeline
  TIMELINE_LIMIT: intEnv('TIMELINE_LIMIT', 200),

  // Server
  SERVER_PORT: intEnv('SERVER_PORT', 3001),

  // Debug
  DEBUG: process.env.DEBUG === 'true',
  LOG_DIR: pathEnv('LOG_DIR', 'logs'),
};

export function validateConfig(): void {
  const thresholds: Array<[string, number]> = [
    ['VOICE_THRESHOLD', ENV.VOICE_THRESHOLD],
    ['FACE_THRESHOLD', ENV.FACE_THRESHOLD],
  ];
  for (const [name, value] of thresholds) {
    if (value < -1 || value > 1) {
      console.warn(`[Config] WARNING: ${name}=${value} is outside [-1, 1]; every check will ${value > 1 ? 'fail' : 'pass'}.`);
    }
  }
  if (ENV.IDLE_PROMPTS && ENV.IDLE_PROMPT_MAX_SEC < ENV.IDLE_PROMPT_MIN_SEC) {
    console.warn('[Config] WARNING: IDLE_PROMPT_MAX_SEC is below IDLE_PROMPT_MIN_SEC; prompts come every IDLE_PROMPT_MIN_SEC.');
  }
  if (ENV.CAMERA_DARK_FRAMES < 1 || ENV.CAMERA_MAX_FAILURES < 1) {
    console.warn('[Config] WARNING: camera frame counts must be at least 1.');
  }
  if (!ENV.OPENAI_API_KEY) {
    console.warn('[Config] WARNING: OPENAI_API_KEY not set. Transcripts must be injected from a control client.');
  }
}
