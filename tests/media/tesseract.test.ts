import assert from 'node:assert/strict';
import test from 'node:test';
import { ToolError } from '../../src/services/media/errors';
import { TesseractOcrEngine } from '../../src/services/media/tesseract';
import { recordingRunner } from '../helpers/fakes';

test('recognize joins readable text and skips unreadable images', async () => {
  const { run, calls } = recordingRunner((call) => {
    switch (call.args[0]) {
      case '/frames/1.png':
        return { stdout: 'Où est la gare ?\n' };
      case '/frames/2.png':
        return { stdout: ' a ' };
      case '/frames/3.png':
        throw new ToolError({ code: 'TOOL_FAILED', tool: 'tesseract', message: 'bad image', operatorHint: 'test' });
      default:
        return { stdout: 'Merci beaucoup.' };
    }
  });
  const engine = new TesseractOcrEngine('tesseract', 'eng+fra', run);

  const text = await engine.recognize(['/frames/1.png', '/frames/2.png', '/frames/3.png', '/frames/4.png']);

  assert.equal(text, 'Où est la gare ?\nMerci beaucoup.');
  assert.deepEqual(calls[0]?.args, ['/frames/1.png', 'stdout', '-l', 'eng+fra', '--psm', '6']);
});

test('recognize reads at most thirty images', async () => {
  const { run, calls } = recordingRunner(() => ({ stdout: 'Bonsoir.' }));
  const engine = new TesseractOcrEngine('tesseract', 'eng', run);

  await engine.recognize(Array.from({ length: 40 }, (_, index) => `/frames/${index}.png`));

  assert.equal(calls.length, 30);
});

test('recognize fails when tesseract is missing', async () => {
  const { run } = recordingRunner(() => {
    throw new ToolError({ code: 'TOOL_MISSING', tool: 'tesseract', message: 'tesseract was not found', operatorHint: 'test' });
  });
  const engine = new TesseractOcrEngine('tesseract', 'eng', run);

  await assert.rejects(engine.recognize(['/frames/1.png']), /tesseract was not found/);
});
