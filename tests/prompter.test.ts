import { PassThrough } from 'stream';
import { Prompter } from '../src/cli/Prompter';

describe('Prompter', () => {
    function prompterFor(text: string) {
        const input = new PassThrough();
        const output = new PassThrough();
        let written = '';
        output.on('data', (chunk: Buffer) => {
            written += chunk.toString();
        });
        input.end(text);
        return { prompter: new Prompter(input, output), written: () => written };
    }

    it('should read a pasted block up to the first empty line', async () => {
        const { prompter, written } = prompterFor('first\nsecond\nthird\n\nnext\n');

        await expect(prompter.ask('> ')).resolves.toBe('first');
        await expect(prompter.readBlock()).resolves.toEqual(['second', 'third']);
        await expect(prompter.nextLine()).resolves.toBe('next');
        expect(written()).toBe('> ');
        prompter.close();
    });

    it('should resolve null once input has ended', async () => {
        const { prompter } = prompterFor('only\n');

        await expect(prompter.nextLine()).resolves.toBe('only');
        await expect(prompter.nextLine()).resolves.toBeNull();
        await expect(prompter.readBlock()).resolves.toEqual([]);
    });
});
