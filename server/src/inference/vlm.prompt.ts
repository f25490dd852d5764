export const DEFAULT_PROMPT = 'Describe what you see in this image in one sentence.';

export const SYSTEM_HINT = [
  'You are looking at a single frame from a live camera stream.',
  'Answer in plain text. No markdown or code fences.',
  'Keep the answer short enough to read as a caption.'
].join('\n');
