import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_CONFIG, type AppConfig, type EmailConfig } from '../../src/lib/config';
import { NotifyError } from '../../src/lib/errors';
import type { Executor } from '../../src/lib/interfaces';
import { CompositeNotifier, createNotifier } from '../../src/lib/notify';
import { DesktopNotifier, notifySendArgs } from '../../src/lib/notify/desktop';
import { EmailNotifier, formatAlertHtml } from '../../src/lib/notify/email';
import type { Notification, Notifier } from '../../src/lib/notify/types';

const { createTransport, sendMail } = vi.hoisted(() => {
    const sendMail = vi.fn();
    return { sendMail, createTransport: vi.fn(() => ({ sendMail })) };
});

vi.mock('nodemailer', () => ({
    default: { createTransport },
    createTransport,
}));

const failure: Notification = { title: 'Unit failed', body: 'nginx.service becomes failed', urgency: 'critical' };

const emailConfig: EmailConfig = {
    enabled: true,
    host: 'smtp.test',
    port: 587,
    secure: false,
    from: 'watch@test',
    to: ['ops@test', 'oncall@test'],
};

const fakeExecutor = () => {
    const exec = vi.fn<Executor['exec']>(async () => ({ stdout: '', stderr: '' }));
    return { exec };
};

describe('DesktopNotifier', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('builds the notify-send arguments', () => {
        expect(notifySendArgs(DEFAULT_CONFIG.notifications.desktop, failure)).toEqual([
            '--app-name=unitscope',
            '--urgency=critical',
            '--icon=text-x-systemd-unit',
            'Unit failed',
            'nginx.service becomes failed',
        ]);
    });

    it('passes an expiry when configured', () => {
        const config = { ...DEFAULT_CONFIG.notifications.desktop, expireMs: 0 };
        expect(notifySendArgs(config, { ...failure, urgency: 'normal' })).toEqual([
            '--app-name=unitscope',
            '--urgency=normal',
            '--icon=text-x-systemd-unit',
            '--expire-time=0',
            'Unit failed',
            'nginx.service becomes failed',
        ]);
    });

    it('runs notify-send through the executor', async () => {
        const executor = fakeExecutor();
        await new DesktopNotifier(DEFAULT_CONFIG.notifications.desktop, executor).notify(failure);

        expect(executor.exec).toHaveBeenCalledWith(
            'notify-send',
            notifySendArgs(DEFAULT_CONFIG.notifications.desktop, failure),
            { timeoutMs: 5000 },
        );
    });

    it('kills notify-send after the configured timeout', async () => {
        const executor = fakeExecutor();
        await new DesktopNotifier(DEFAULT_CONFIG.notifications.desktop, executor, 1500).notify(failure);

        expect(executor.exec).toHaveBeenCalledWith('notify-send', expect.any(Array), { timeoutMs: 1500 });
    });

    it('replaces the previous notification of the same unit', async () => {
        const executor = fakeExecutor();
        executor.exec.mockResolvedValueOnce({ stdout: '17\n', stderr: '' });
        const notifier = new DesktopNotifier(DEFAULT_CONFIG.notifications.desktop, executor);

        await notifier.notify({ ...failure, key: 'nginx.service' });
        await notifier.notify({ ...failure, key: 'nginx.service' });
        await notifier.notify({ ...failure, body: 'cron.service becomes failed', key: 'cron.service' });

        const argsOf = (call: number) => executor.exec.mock.calls[call][1];
        expect(argsOf(0)).toEqual([
            '--app-name=unitscope',
            '--urgency=critical',
            '--icon=text-x-systemd-unit',
            '--print-id',
            'Unit failed',
            'nginx.service becomes failed',
        ]);
        expect(argsOf(1)).toContain('--replace-id=17');
        expect(argsOf(2)).toEqual([
            '--app-name=unitscope',
            '--urgency=critical',
            '--icon=text-x-systemd-unit',
            '--print-id',
            'Unit failed',
            'cron.service becomes failed',
        ]);
    });

    it('stacks notifications when replacing is off', async () => {
        const executor = fakeExecutor();
        executor.exec.mockResolvedValue({ stdout: '17\n', stderr: '' });
        const notifier = new DesktopNotifier({ ...DEFAULT_CONFIG.notifications.desktop, replace: false }, executor);

        await notifier.notify({ ...failure, key: 'nginx.service' });
        await notifier.notify({ ...failure, key: 'nginx.service' });

        expect(executor.exec.mock.calls[1][1]).toEqual([
            '--app-name=unitscope',
            '--urgency=critical',
            '--icon=text-x-systemd-unit',
            'Unit failed',
            'nginx.service becomes failed',
        ]);
    });

    it('wraps a failed notify-send in a NotifyError', async () => {
        const executor = fakeExecutor();
        executor.exec.mockRejectedValueOnce(new Error('spawn notify-send ENOENT'));
        const notifier = new DesktopNotifier(DEFAULT_CONFIG.notifications.desktop, executor);

        const result = notifier.notify(failure);
        await expect(result).rejects.toBeInstanceOf(NotifyError);
        await expect(result).rejects.toThrow('[desktop] notify-send failed: spawn notify-send ENOENT');
    });
});

describe('EmailNotifier', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('sends the alert to every recipient', async () => {
        sendMail.mockResolvedValueOnce({ messageId: 'test-id' });
        await new EmailNotifier(emailConfig).notify(failure);

        expect(createTransport).toHaveBeenCalledWith({ host: 'smtp.test', port: 587, secure: false, auth: undefined });
        expect(sendMail).toHaveBeenCalledWith(expect.objectContaining({
            from: 'watch@test',
            to: 'ops@test, oncall@test',
            subject: '[unitscope] Unit failed',
            text: 'nginx.service becomes failed',
        }));
    });

    it('authenticates when a user is configured', () => {
        new EmailNotifier({ ...emailConfig, user: 'mailer', pass: 'test-secret' });

        expect(createTransport).toHaveBeenCalledWith(expect.objectContaining({
            auth: { user: 'mailer', pass: 'test-secret' },
        }));
    });

    it('wraps a delivery failure in a NotifyError', async () => {
        sendMail.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

        await expect(new EmailNotifier(emailConfig).notify(failure)).rejects.toThrow(
            '[email] Failed to send alert: connect ECONNREFUSED',
        );
    });

    it('escapes markup in the HTML body', () => {
        const html = formatAlertHtml({ ...failure, body: 'a <b> & c' });
        expect(html).toContain('a &lt;b&gt; &amp; c');
    });
});

describe('CompositeNotifier', () => {
    const channel = (name: string, notify: Notifier['notify']) => ({ channel: name, notifier: { notify } });

    it('tries every channel and names the ones that failed', async () => {
        const desktop = vi.fn<Notifier['notify']>(async () => undefined);
        const email = vi.fn<Notifier['notify']>(async () => {
            throw new NotifyError('email', 'smtp down');
        });
        const notifier = new CompositeNotifier([channel('email', email), channel('desktop', desktop)]);

        const result = notifier.notify(failure);
        await expect(result).rejects.toThrow('[email] smtp down');
        expect(desktop).toHaveBeenCalledWith(failure);
        expect(email).toHaveBeenCalledWith(failure);
    });

    it('lists every failed channel', async () => {
        const notifier = new CompositeNotifier([
            channel('desktop', async () => {
                throw new NotifyError('desktop', 'notify-send failed: exit 1');
            }),
            channel('email', async () => {
                throw new Error('timeout');
            }),
        ]);

        try {
            await notifier.notify(failure);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(NotifyError);
            if (error instanceof NotifyError) {
                expect(error.channel).toBe('desktop,email');
                expect(error.message).toBe('[desktop,email] notify-send failed: exit 1; timeout');
            }
        }
    });

    it('resolves when every channel delivered', async () => {
        const notifier = new CompositeNotifier([channel('desktop', async () => undefined)]);
        await expect(notifier.notify(failure)).resolves.toBeUndefined();
    });
});

describe('createNotifier', () => {
    const withNotifications = (notifications: Partial<AppConfig['notifications']>): AppConfig => ({
        ...DEFAULT_CONFIG,
        notifications: { ...DEFAULT_CONFIG.notifications, ...notifications },
    });

    it('uses the desktop by default', () => {
        expect(createNotifier(DEFAULT_CONFIG, fakeExecutor()).channelNames).toEqual(['desktop']);
    });

    it('bounds notify-send by the watcher notification timeout', async () => {
        const executor = fakeExecutor();
        const config = { ...DEFAULT_CONFIG, watcher: { ...DEFAULT_CONFIG.watcher, notifyTimeoutMs: 2500 } };

        await createNotifier(config, executor).notify(failure);

        expect(executor.exec).toHaveBeenCalledWith('notify-send', expect.any(Array), { timeoutMs: 2500 });
    });

    it('adds email when enabled', () => {
        expect(createNotifier(withNotifications({ email: emailConfig })).channelNames).toEqual(['desktop', 'email']);
        expect(createNotifier(withNotifications({ email: { ...emailConfig, enabled: false } })).channelNames).toEqual([
            'desktop',
        ]);
    });

    it('allows every channel to be switched off', () => {
        const config = withNotifications({ desktop: { ...DEFAULT_CONFIG.notifications.desktop, enabled: false } });
        expect(createNotifier(config).channelNames).toEqual([]);
    });
});
