/**
 * Browser demo for the triangular grid.
 * Runs the same session loop as the terminal front end against an HTML canvas
 * and the page's keyboard.
 */

import { SCREEN_HEIGHT, SCREEN_WIDTH, RenderMode } from '../core/types.js';
import { FrameStats } from '../core/stats.js';
import { QueuedInputSource } from '../controller/input_queue.js';
import { KeyClassifier } from '../controller/key_classifier.js';
import { runSession } from '../session/session.js';
import { HtmlCanvasHost } from './canvas_host.js';
import { inputKeyFromKeyboard } from './keyboard.js';

function byId<T extends HTMLElement>(id: string, type: { new (): T }): T {
  const el = document.getElementById(id);
  if (!(el instanceof type)) {
    throw new Error(`missing #${id}`);
  }
  return el;
}

// DOM elements
const screen = byId('screen', HTMLCanvasElement);
const modeSelect = byId('mode', HTMLSelectElement);
const seedInput = byId('seed', HTMLInputElement);
const startBtn = byId('startBtn', HTMLButtonElement);
const statusLine = byId('status', HTMLDivElement);

const classifier = new KeyClassifier();
let input: QueuedInputSource | null = null;

function describe(stats: FrameStats): string {
  return `visible ${stats.visible} (full ${stats.fullyVisible}, partial ${stats.partiallyVisible}) · ` +
    `lines ${stats.linesDrawn} · area ${stats.triangleArea} · mirrored ${stats.mirroredPixels}`;
}

function handleKeyDown(e: KeyboardEvent): void {
  const key = inputKeyFromKeyboard(e.key);
  if (!key || !input) return;
  e.preventDefault();
  input.push(classifier.keyDown(key, e.repeat));
}

function handleKeyUp(): void {
  classifier.keyUp();
}

async function start(): Promise<void> {
  input?.close();

  const mode: RenderMode = modeSelect.value === 'outline' ? 'outline' : 'mirror';
  const seed = parseInt(seedInput.value, 10);
  const session = new QueuedInputSource();
  input = session;
  startBtn.disabled = true;

  try {
    const code = await runSession({
      host: new HtmlCanvasHost(screen, SCREEN_WIDTH, SCREEN_HEIGHT),
      input: session,
      options: {
        mode,
        seed: Number.isFinite(seed) && seed >= 0 ? seed : undefined,
      },
      onFrame: (stats, config) => {
        statusLine.textContent = `side ${config.sideLength} · pixels ${config.numRandomPixels} · ${describe(stats)}`;
      },
    });
    statusLine.textContent = `session ended (exit ${code})`;
  } finally {
    session.close();
    if (input === session) input = null;
    startBtn.disabled = false;
  }
}

function startLogged(): void {
  start().catch((err: unknown) => {
    console.error('[tri-grid] session failed:', err);
    statusLine.textContent = String(err);
  });
}

// === Initialization ===

window.addEventListener('keydown', handleKeyDown);
window.addEventListener('keyup', handleKeyUp);
startBtn.addEventListener('click', startLogged);
modeSelect.addEventListener('change', () => {
  // Back ends the running session; the button restarts in the new mode.
  input?.push({ key: 'back', kind: 'press' });
});

startLogged();

console.log('Tri-grid demo initialized');
