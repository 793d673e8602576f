import chalk from 'chalk';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import { InteractiveSession } from '../src/cli/InteractiveSession';
import { Prompter } from '../src/cli/Prompter';
import { BatchOrchestrator } from '../src/download/core/BatchOrchestrator';
import { BatchState } from '../src/download/core/BatchState';
import { AppContext } from '../src/types';
import { loadConfig } from '../src/utils/config';
import { CookiesManager } from '../src/utils/CookiesManager';
import { FileManager } from '../src/utils/FileManager';
import { fail, FakeEngine, ok, offlineValidator } from './helpers/fakes';

describe('InteractiveSession', () => {
    let root: string;
    let base: string;
    let engine: FakeEngine;
    let ctx: AppContext;
    let printed: string[];

    beforeAll(() => {
        chalk.level = 0;
    });

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'session-'));
        base = path.join(root, 'Downloads');
        printed = [];

        engine = new FakeEngine((config) =>
            config.url.includes('dead.example')
                ? fail('Video unavailable')
                : ok(path.join(config.outputDirectory, `clip.${config.exportFormat}`)),
        );

        const config = loadConfig({ DOWNLOAD_BASE_DIR: base, COOKIE_BROWSERS: 'firefox' }, root);
        const cookiesManager = new CookiesManager(config.cookies);
        ctx = {
            config,
            cookiesManager,
            fileManager: new FileManager(config.downloadBaseDir),
            orchestrator: new BatchOrchestrator({
                engine,
                cookieSources: cookiesManager,
                validator: offlineValidator(),
            }),
            state: new BatchState(),
        };
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    function sessionWith(lines: string[]): InteractiveSession {
        const input = new PassThrough();
        input.end(lines.map((line) => `${line}\n`).join(''));
        const prompter = new Prompter(input, new PassThrough());
        return new InteractiveSession(ctx, prompter, (line) => printed.push(...line.split('\n')));
    }

    it('should run a pasted batch with the chosen folder and formats', async () => {
        const session = sessionWith([
            'https://good.example/a https://dead.example/b',
            '',
            'clips',
            '1 4',
            '',
        ]);

        await expect(session.run()).resolves.toBe(1);

        expect(ctx.state.outputDirectory).toBe(path.join(base, 'clips'));
        expect(ctx.state.requestedFormats).toEqual(['mp4', 'mp3']);
        expect(engine.calls.map((call) => `${call.url} ${call.exportFormat}`)).toEqual([
            'https://good.example/a mp4',
            'https://good.example/a mp3',
            'https://dead.example/b mp4',
            'https://dead.example/b mp3',
        ]);
        expect(printed).toContain('ok=1 failed=1 invalid=0 (total 2)');
        expect(printed.slice(printed.indexOf('Failed URLs:') + 1)).toEqual(['https://dead.example/b']);
    });

    it('should keep folder and formats for the next pass', async () => {
        const session = sessionWith([
            'https://good.example/a',
            '',
            '',
            '',
            'https://good.example/b',
            '',
            '',
        ]);

        await expect(session.run()).resolves.toBe(2);

        expect(ctx.state.outputDirectory).toBe(base);
        expect(engine.calls.map((call) => call.url)).toEqual(['https://good.example/a', 'https://good.example/b']);
    });

    it('should re-prompt for the folder after an invalid one', async () => {
        const session = sessionWith(['https://good.example/a', '', '../outside', 'inside', '2', '']);

        await expect(session.run()).resolves.toBe(1);

        expect(printed).toContain(`Subfolder must stay inside ${base}.`);
        expect(ctx.state.outputDirectory).toBe(path.join(base, 'inside'));
        expect(engine.calls.map((call) => call.exportFormat)).toEqual(['mkv']);
    });

    it('should clear sticky state on reset', async () => {
        ctx.state.outputDirectory = base;
        ctx.state.requestedFormats = ['mp3'];

        const session = sessionWith(['r', '']);

        await expect(session.run()).resolves.toBe(0);
        expect(ctx.state.outputDirectory).toBeNull();
        expect(ctx.state.requestedFormats).toBeNull();
        expect(printed).toContain('Reset: output folder, formats and cookie mode cleared.');
    });

    it('should pick up a cookie file exported before a reset', async () => {
        expect(ctx.cookiesManager.getSources()).toEqual([{ kind: 'browser', browser: 'firefox' }]);
        fs.writeFileSync(ctx.config.cookies.cookiesFile, '# Netscape HTTP Cookie File\n');

        const session = sessionWith(['r', '']);

        await expect(session.run()).resolves.toBe(0);
        expect(ctx.cookiesManager.getSources()).toEqual([
            { kind: 'file', path: path.join(root, 'cookies.txt') },
        ]);
    });

    it('should read the batch file on request', async () => {
        fs.writeFileSync(ctx.config.linksFile, '# saved links\nhttps://good.example/from-file\n');
        const session = sessionWith(['f', '', '', '']);

        await expect(session.run()).resolves.toBe(1);
        expect(engine.calls.map((call) => call.url)).toEqual(['https://good.example/from-file']);
    });

    it('should process an initial file once and stop', async () => {
        const file = path.join(root, 'batch.txt');
        fs.writeFileSync(file, 'https://good.example/1\nhttps://nxdomain.example/2\n');
        const session = sessionWith(['', '']);

        await expect(session.run({ initialFile: file, once: true })).resolves.toBe(1);

        expect(engine.calls.map((call) => call.url)).toEqual(['https://good.example/1']);
        expect(printed).toContain('ok=1 failed=0 invalid=1 (total 2)');
        expect(printed).toContain("https://nxdomain.example/2 (Host does not resolve (DNS): 'nxdomain.example')");
    });

    it('should report text without links and keep prompting', async () => {
        const session = sessionWith(['just some words', '', '']);

        await expect(session.run()).resolves.toBe(0);
        expect(printed).toContain('No links found.');
        expect(engine.calls).toHaveLength(0);
    });
});
