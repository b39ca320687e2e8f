export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'night';

export function timeOfDay(now: Date): TimeOfDay {
  const hour = now.getHours();
  if (hour >= 5 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 17) return 'afternoon';
  if (hour >= 17 && hour < 22) return 'evening';
  return 'night';
}

const GREETINGS: Record<TimeOfDay, (owner: string) => string> = {
  morning: (owner) => `Good morning, ${owner}. Vigil online and standing by.`,
  afternoon: (owner) => `Good afternoon, ${owner}. Vigil online and fully functional.`,
  evening: (owner) => `Good evening, ${owner}. Vigil online and ready to assist.`,
  night: (owner) => `Late session, ${owner}? Vigil online and watching your back.`,
};

const DAYTIME_PROMPTS = [
  "You've been quiet for a while. Need any help?",
  'Remember to take short breaks while working.',
  "I'm monitoring your system. Everything looks stable.",
  'If you want to note something, just tell me.',
];

const LATE_PROMPTS = [
  'Still awake? I can help you wrap things up.',
  "Late hours detected. Don't forget to rest.",
  'If you need anything, just say my name.',
];

/**
 * Something to say while nobody is talking to us. `roll` in [0, 1) picks the line.
 */
export function idlePrompt(now: Date, roll: number): string {
  const tod = timeOfDay(now);
  const pool = tod === 'morning' || tod === 'afternoon' ? DAYTIME_PROMPTS : LATE_PROMPTS;
  const index = Math.min(pool.length - 1, Math.floor(roll * pool.length));
  return pool[index] ?? pool[0] ?? '';
}

/**
 * Fixed utterances. Each failure class has its own wording so transcripts
 * alone tell them apart.
 */
export const MESSAGES = {
  noSpeech: "I didn't catch anything. Please try again.",
  intruder: 'Intruder alert. Access denied.',
  trouble: "Sorry, I'm having trouble understanding right now.",
  generic: 'Something went wrong. Please try again.',
  cameraBlocked: 'Warning. The camera is blocked.',
  cameraRestored: 'Camera feed restored.',
  enrolled: (modality: string) => `Your ${modality} profile has been saved.`,
  greeting: (owner: string, now: Date) => GREETINGS[timeOfDay(now)](owner),
} as const;
