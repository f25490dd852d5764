import fs from 'fs/promises';
import path from 'path';
import WebSocket from 'ws';

const url = process.argv[2] ?? 'ws://localhost:8080/ws';
const imagePath = process.argv[3];
const fps = Number(process.argv[4] ?? 10);
const count = Number(process.argv[5] ?? 100);
const processEvery = process.argv[6] ? Number(process.argv[6]) : null;

if (!imagePath || !(fps > 0) || !(count > 0)) {
  console.error('Usage: tsx client_stub/frame_sender.ts <wsUrl> <imagePath> [fps=10] [frames=100] [processEveryN]');
  process.exit(1);
}

const ext = path.extname(imagePath).toLowerCase();
const mime = ext === '.png' ? 'image/png' : 'image/jpeg';
const ws = new WebSocket(url);
let forwarded = 0;

async function stream() {
  const image_base64 = (await fs.readFile(imagePath)).toString('base64');

  if (processEvery !== null) {
    ws.send(JSON.stringify({ type: 'update_processing', process_every_n_frames: processEvery }));
  }

  let sent = 0;
  const timer = setInterval(() => {
    if (sent >= count) {
      clearInterval(timer);
      setTimeout(() => ws.close(), 1500);
      return;
    }
    sent += 1;
    ws.send(JSON.stringify({ type: 'frame', image_base64, mime, t_ms: Date.now() }));
  }, 1000 / fps);
}

ws.on('open', () => {
  stream().catch((error) => {
    console.error('Failed to stream frames', error);
    ws.close();
    process.exit(1);
  });
});

ws.on('message', (data) => {
  const text = data.toString();
  let message: unknown;
  try {
    message = JSON.parse(text);
  } catch {
    console.log('<<', text);
    return;
  }
  if (isFrame(message)) {
    forwarded += 1;
    if (forwarded % Math.max(1, Math.round(fps)) === 0) {
      console.log(`<< frame ${message.seq} [${message.overlay.status}] ${message.overlay.text}`);
    }
    return;
  }
  console.log('<<', message);
});

ws.on('close', () => {
  console.log(`WebSocket closed after ${forwarded} forwarded frames`);
  process.exit(0);
});

ws.on('error', (error) => {
  console.error('WebSocket error', error);
  process.exit(1);
});

function isFrame(value: unknown): value is { seq: number; overlay: { text: string; status: string } } {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'frame';
}
