import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SettingsError } from '../../errors.js';
import { DEFAULT_SETTINGS } from '../defaults.js';
import { SettingsLoader } from '../loader.js';

describe('SettingsLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'linemenu-settings-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('uses defaults when there is no settings file', async () => {
        const settings = await new SettingsLoader({ cwd: dir, env: {} }).load();

        expect(settings).toEqual({
            title: DEFAULT_SETTINGS.title,
            help: DEFAULT_SETTINGS.help,
            about: DEFAULT_SETTINGS.about,
            extensionsDir: path.join(dir, 'extensions'),
            shell: '/bin/sh',
            logFile: undefined,
            spinner: false,
            source: undefined,
        });
    });

    it('reads appsettings.yml and resolves paths beside it', async () => {
        await writeFile(
            path.join(dir, 'appsettings.yml'),
            ['title: NODE', 'extensions_dir: menus', 'log_file: logs/session.log', 'spinner: true', ''].join('\n'),
        );

        const settings = await new SettingsLoader({ cwd: dir, env: {} }).load();

        expect(settings.title).toBe('NODE');
        expect(settings.extensionsDir).toBe(path.join(dir, 'menus'));
        expect(settings.logFile).toBe(path.join(dir, 'logs', 'session.log'));
        expect(settings.spinner).toBe(true);
        expect(settings.source).toBe(path.join(dir, 'appsettings.yml'));
    });

    it('resolves an explicit file relative to cwd and its paths relative to the file', async () => {
        await mkdir(path.join(dir, 'conf'));
        await writeFile(path.join(dir, 'conf', 'node.yml'), 'extensions_dir: ../ext\n');

        const settings = await new SettingsLoader({ cwd: dir, file: 'conf/node.yml', env: {} }).load();

        expect(settings.extensionsDir).toBe(path.join(dir, 'ext'));
    });

    it('takes the settings file from the environment', async () => {
        await writeFile(path.join(dir, 'other.yml'), 'title: FROM ENV\n');

        const settings = await new SettingsLoader({ cwd: dir, env: { LINEMENU_SETTINGS: 'other.yml' } }).load();

        expect(settings.title).toBe('FROM ENV');
    });

    it('lets the environment override directories', async () => {
        await writeFile(path.join(dir, 'appsettings.yml'), 'extensions_dir: menus\nlog_file: a.log\n');

        const settings = await new SettingsLoader({
            cwd: dir,
            env: { LINEMENU_EXTENSIONS_DIR: 'override', LINEMENU_LOG_FILE: '/var/tmp/b.log' },
        }).load();

        expect(settings.extensionsDir).toBe(path.join(dir, 'override'));
        expect(settings.logFile).toBe('/var/tmp/b.log');
    });

    it('treats an empty file as all defaults', async () => {
        await writeFile(path.join(dir, 'appsettings.yml'), '');

        const settings = await new SettingsLoader({ cwd: dir, env: {} }).load();

        expect(settings.title).toBe(DEFAULT_SETTINGS.title);
        expect(settings.source).toBe(path.join(dir, 'appsettings.yml'));
    });

    it('fails when an explicit file is missing', async () => {
        const load = new SettingsLoader({ cwd: dir, file: 'missing.yml', env: {} }).load();

        await expect(load).rejects.toBeInstanceOf(SettingsError);
        await expect(load).rejects.toThrow(/^Cannot read settings file /);
    });

    it('fails on invalid values', async () => {
        const file = path.join(dir, 'appsettings.yml');
        await writeFile(file, 'spinner: sometimes\n');

        await expect(new SettingsLoader({ cwd: dir, env: {} }).load()).rejects.toThrow(
            `Invalid settings in ${file}: spinner: Expected boolean, received string`,
        );
    });

    it('fails on malformed YAML', async () => {
        await writeFile(path.join(dir, 'appsettings.yml'), 'title: [unclosed\n');

        await expect(new SettingsLoader({ cwd: dir, env: {} }).load()).rejects.toThrow(/^Invalid YAML in /);
    });
});
