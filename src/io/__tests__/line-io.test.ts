import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { ReadlineIO } from '../line-io.js';

describe('ReadlineIO', () => {
    let input: PassThrough;
    let output: PassThrough;
    let written: string;

    beforeEach(() => {
        input = new PassThrough();
        output = new PassThrough();
        written = '';
        output.on('data', (chunk: Buffer) => {
            written += chunk.toString();
        });
    });

    it('reads a line typed after the prompt', async () => {
        const io = new ReadlineIO(input, output);

        const pending = io.readLine('> ');
        input.write('rpbook\n');

        expect(await pending).toBe('rpbook');
        expect(written).toBe('> ');
        io.close();
    });

    it('keeps lines that arrive before they are asked for', async () => {
        const io = new ReadlineIO(input, output);
        input.write('first\nsecond\n');
        await new Promise((resolve) => setImmediate(resolve));

        expect(await io.readLine('a: ')).toBe('first');
        expect(await io.readLine('b: ')).toBe('second');
        io.close();
    });

    it('resumes input that was paused between reads', async () => {
        const io = new ReadlineIO(input, output);

        const first = io.readLine('> ');
        input.write('first\n');
        expect(await first).toBe('first');

        input.pause();
        const second = io.readLine('> ');
        input.write('second\n');

        expect(await second).toBe('second');
        io.close();
    });

    it('resolves null once input ends', async () => {
        const io = new ReadlineIO(input, output);

        const pending = io.readLine('> ');
        input.end();

        expect(await pending).toBeNull();
        expect(await io.readLine('> ')).toBeNull();
    });

    it('prints whole lines and raw text', async () => {
        const io = new ReadlineIO(input, output);

        io.print('Callbook: [S]Search');
        io.print();
        io.write('raw');
        await new Promise((resolve) => setImmediate(resolve));

        expect(written).toBe('Callbook: [S]Search\n\nraw');
        io.close();
    });
});
