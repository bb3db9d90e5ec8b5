import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigError } from '../../src/lib/errors';
import { IgnoreList, loadIgnoreList, parseIgnoreFile } from '../../src/lib/watcher/ignore';

describe('parseIgnoreFile', () => {
    it('reads names and patterns and skips comments', () => {
        const content = '# noisy units\n\nfoo.service\n  bar.service  \nREGEX|user@.*\nREGEX|\n';

        expect(parseIgnoreFile(content)).toEqual({
            names: ['foo.service', 'bar.service'],
            patterns: ['user@.*'],
        });
    });
});

describe('IgnoreList', () => {
    const list = new IgnoreList({ names: ['foo.service'], patterns: ['user@.*', 'run-r[0-9a-f]+\\.scope'] });

    it('matches exact names', () => {
        expect(list.isIgnored('foo.service')).toBe(true);
        expect(list.isIgnored('foo.socket')).toBe(false);
    });

    it('matches patterns from the start of the name', () => {
        expect(list.isIgnored('user@1000.service')).toBe(true);
        expect(list.isIgnored('run-r3f2a.scope')).toBe(true);
        expect(list.isIgnored('systemd-user@1000.service')).toBe(false);
    });

    it('rejects an invalid pattern', () => {
        expect(() => new IgnoreList({ names: [], patterns: ['(unclosed'] })).toThrow(ConfigError);
    });

    it('ignores nothing when empty', () => {
        expect(IgnoreList.empty().isIgnored('anything.service')).toBe(false);
    });
});

describe('loadIgnoreList', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'unitscope-ignore-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('merges configured names with the file', async () => {
        const file = path.join(dir, 'ignore.list');
        await fs.writeFile(file, 'packagekit.service\nREGEX|snap-.*\\.mount\n');

        const list = await loadIgnoreList(['apt-daily.service'], file);

        expect(list.isIgnored('apt-daily.service')).toBe(true);
        expect(list.isIgnored('packagekit.service')).toBe(true);
        expect(list.isIgnored('snap-core-123.mount')).toBe(true);
        expect(list.isIgnored('nginx.service')).toBe(false);
    });

    it('accepts a missing file', async () => {
        const list = await loadIgnoreList(['apt-daily.service'], path.join(dir, 'missing.list'));
        expect(list.isIgnored('apt-daily.service')).toBe(true);
    });

    it('reports a file it cannot read', async () => {
        await expect(loadIgnoreList([], dir)).rejects.toBeInstanceOf(ConfigError);
    });
});
