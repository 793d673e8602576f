import http from 'http';
import { httpRangeProbe } from '../src/utils/UrlValidator';

describe('httpRangeProbe', () => {
    let server: http.Server;
    let baseUrl: string;
    const rangeHeaders: Array<string | undefined> = [];

    beforeAll(async () => {
        server = http.createServer((req, res) => {
            rangeHeaders.push(req.headers.range);

            if (req.url === '/media') {
                res.writeHead(206, { 'Content-Range': 'bytes 0-0/10' });
                res.end('x');
            } else if (req.url === '/forbidden') {
                res.writeHead(403);
                res.end();
            } else if (req.url === '/to-unresolvable') {
                res.writeHead(302, { Location: 'http://tls-gateway.invalid/clip' });
                res.end();
            } else if (req.url === '/moved') {
                res.writeHead(302, { Location: '/media' });
                res.end();
            }
            // '/hang' never answers
        });

        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should ask for the first byte only', async () => {
        rangeHeaders.length = 0;

        await expect(httpRangeProbe(`${baseUrl}/media`, 2000)).resolves.toEqual({
            kind: 'reachable',
            status: 206,
        });
        expect(rangeHeaders).toEqual(['bytes=0-0']);
    });

    it('should follow redirects', async () => {
        await expect(httpRangeProbe(`${baseUrl}/moved`, 2000)).resolves.toEqual({
            kind: 'reachable',
            status: 206,
        });
    });

    it('should report HTTP errors as blocked', async () => {
        await expect(httpRangeProbe(`${baseUrl}/forbidden`, 2000)).resolves.toEqual({
            kind: 'blocked',
            detail: 'HTTP 403',
        });
    });

    it('should treat a connection failure to a host named like TLS as blocked', async () => {
        const outcome = await httpRangeProbe(`${baseUrl}/to-unresolvable`, 8000);

        expect(outcome.kind).toBe('blocked');
    }, 15000);

    it('should report a silent server as a timeout', async () => {
        await expect(httpRangeProbe(`${baseUrl}/hang`, 200)).resolves.toEqual({ kind: 'timeout' });
    });
});
