import { detectHostTypo, isTlsFailure, ProbeOutcome, URLValidator } from '../src/utils/UrlValidator';

function validatorWith(probeOutcome: ProbeOutcome | Error, resolveFails = false) {
    const resolved: string[] = [];
    const probed: Array<{ url: string; timeoutMs: number }> = [];

    const validator = new URLValidator({
        timeoutMs: 1500,
        resolveHost: async (host) => {
            resolved.push(host);
            if (resolveFails) {
                throw new Error(`getaddrinfo ENOTFOUND ${host}`);
            }
        },
        probe: async (url, timeoutMs) => {
            probed.push({ url, timeoutMs });
            if (probeOutcome instanceof Error) {
                throw probeOutcome;
            }
            return probeOutcome;
        },
    });

    return { validator, resolved, probed };
}

describe('URLValidator', () => {
    describe('syntax checks', () => {
        it('should reject text that does not parse as a URL', async () => {
            const { validator, resolved } = validatorWith({ kind: 'reachable', status: 200 });

            await expect(validator.validate('not a url')).resolves.toEqual({
                valid: false,
                error: 'invalid_format',
                reason: 'URL parse failed.',
            });
            expect(resolved).toEqual([]);
        });

        it('should reject schemes other than http and https', async () => {
            const { validator } = validatorWith({ kind: 'reachable', status: 200 });

            await expect(validator.validate('ftp://files.example/a')).resolves.toEqual({
                valid: false,
                error: 'bad_scheme',
                reason: 'URL must start with http:// or https://',
            });
        });
    });

    describe('typo hints', () => {
        it('should flag near-miss platform hosts', async () => {
            const { validator, resolved } = validatorWith({ kind: 'reachable', status: 200 });

            const result = await validator.validate('https://youtbe.com/watch?v=abc');

            expect(result.valid).toBe(false);
            expect(result.error).toBe('typo');
            expect(result.reason).toBe(
                "Host looks like a typo. Did you mean 'youtube.com' or 'youtu.be'? (got 'youtbe.com')",
            );
            expect(resolved).toEqual([]);
        });

        it('should accept real platform hosts and their subdomains', () => {
            expect(detectHostTypo('youtube.com')).toBeNull();
            expect(detectHostTypo('www.youtube.com')).toBeNull();
            expect(detectHostTypo('m.youtube.com')).toBeNull();
            expect(detectHostTypo('youtu.be')).toBeNull();
            expect(detectHostTypo('vm.tiktok.com')).toBeNull();
            expect(detectHostTypo('example.org')).toBeNull();
        });

        it('should name the expected domain for other platforms', () => {
            expect(detectHostTypo('instagrm.com')).toBe(
                "Host looks like a typo. Did you mean 'instagram.com'? (got 'instagrm.com')",
            );
            expect(detectHostTypo('twittr.com')).toBe(
                "Host looks like a typo. Did you mean 'twitter.com' or 'x.com'? (got 'twittr.com')",
            );
        });
    });

    describe('DNS', () => {
        it('should mark unresolvable hosts invalid without probing', async () => {
            const { validator, probed } = validatorWith({ kind: 'reachable', status: 200 }, true);

            await expect(validator.validate('https://dead.invalid/clip')).resolves.toEqual({
                valid: false,
                error: 'dns',
                reason: "Host does not resolve (DNS): 'dead.invalid'",
                host: 'dead.invalid',
            });
            expect(probed).toEqual([]);
        });
    });

    describe('reachability probe', () => {
        it('should pass the configured timeout to the probe', async () => {
            const { validator, probed } = validatorWith({ kind: 'reachable', status: 206 });

            await expect(validator.validate('https://good.example/a')).resolves.toEqual({
                valid: true,
                host: 'good.example',
            });
            expect(probed).toEqual([{ url: 'https://good.example/a', timeoutMs: 1500 }]);
        });

        it('should treat a TLS failure as fatal', async () => {
            const { validator } = validatorWith({ kind: 'tls_failure', detail: 'certificate has expired' });

            await expect(validator.validate('https://expired.example/a')).resolves.toEqual({
                valid: false,
                error: 'ssl',
                reason: 'SSL error: certificate has expired',
                host: 'expired.example',
            });
        });

        it('should let blocked probes through', async () => {
            const { validator } = validatorWith({ kind: 'blocked', detail: 'HTTP 403' });

            await expect(validator.validate('https://guarded.example/a')).resolves.toEqual({
                valid: true,
                host: 'guarded.example',
            });
        });

        it('should let timed-out probes through', async () => {
            const { validator } = validatorWith({ kind: 'timeout' });

            await expect(validator.validate('https://slow.example/a')).resolves.toEqual({
                valid: true,
                host: 'slow.example',
            });
        });

        it('should treat a probe that throws as blocked', async () => {
            const { validator } = validatorWith(new Error('socket hang up'));

            await expect(validator.validate('https://flaky.example/a')).resolves.toEqual({
                valid: true,
                host: 'flaky.example',
            });
        });
    });

    describe('isTlsFailure', () => {
        it('should recognise TLS error codes through the cause chain', () => {
            expect(isTlsFailure({ code: 'CERT_HAS_EXPIRED' })).toBe(true);
            expect(
                isTlsFailure(new Error('fetch failed', { cause: { code: 'ERR_TLS_CERT_ALTNAME_INVALID' } })),
            ).toBe(true);
            expect(isTlsFailure(new Error('fetch failed', { cause: new Error('self signed certificate') }))).toBe(
                true,
            );
        });

        it('should not mistake other connection errors for TLS', () => {
            expect(isTlsFailure(new Error('fetch failed', { cause: new Error('connect ECONNREFUSED') }))).toBe(false);
            expect(
                isTlsFailure(
                    new Error('fetch failed', {
                        cause: Object.assign(new Error('getaddrinfo ENOTFOUND tls-gateway.invalid'), {
                            code: 'ENOTFOUND',
                        }),
                    }),
                ),
            ).toBe(false);
            expect(isTlsFailure(new Error('connect ETIMEDOUT ssl.cdn.example:443'))).toBe(false);
            expect(isTlsFailure('boom')).toBe(false);
            expect(isTlsFailure(null)).toBe(false);
        });
    });

    describe('DNS deadline', () => {
        it('should let the engine decide when the lookup outlasts the timeout', async () => {
            const probed: string[] = [];
            const validator = new URLValidator({
                timeoutMs: 50,
                resolveHost: () => new Promise<void>(() => undefined),
                probe: async (url) => {
                    probed.push(url);
                    return { kind: 'reachable', status: 200 };
                },
            });

            await expect(validator.validate('https://slow-dns.example/clip')).resolves.toEqual({
                valid: true,
                host: 'slow-dns.example',
            });
            expect(probed).toEqual([]);
        });

        it('should still reject a lookup that fails before the timeout', async () => {
            const validator = new URLValidator({
                timeoutMs: 1000,
                resolveHost: async (host) => {
                    throw new Error(`getaddrinfo ENOTFOUND ${host}`);
                },
                probe: async () => ({ kind: 'reachable', status: 200 }),
            });

            await expect(validator.validate('https://gone.example/clip')).resolves.toEqual({
                valid: false,
                error: 'dns',
                reason: "Host does not resolve (DNS): 'gone.example'",
                host: 'gone.example',
            });
        });
    });
});
