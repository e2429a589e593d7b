import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { HttpPageFetcher, loadSubjectDirectory } from '../../../../src/infrastructure/scraper/HttpPageFetcher';
import { PermanentError } from '../../../../src/domain/errors/PipelineErrors';

const HOMEPAGE = `<html>
<head><title>Acme Co</title><script>var tracking = true;</script></head>
<body>
<nav>Home | Pricing</nav>
<p>Acme builds   reusable
rockets.</p>
<div class="cookie-banner">We use cookies</div>
<footer>© Acme</footer>
</body>
</html>`;

describe('HttpPageFetcher', () => {
    const subjects = { AcmeCo: 'https://acme.example.com' };

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    describe('fetch', () => {
        it('should fetch the homepage and the subpages that exist', async () => {
            nock('https://acme.example.com')
                .matchHeader('user-agent', 'LiveIntelBot/1.0')
                .get('/').reply(200, HOMEPAGE)
                .get('/about').reply(200, '<html><body><p>About Acme</p></body></html>')
                .get('/team').reply(404, 'Not found');

            const fetcher = new HttpPageFetcher({ subjects, subpagePaths: ['/about', '/team'] });
            const bundle = await fetcher.fetch('AcmeCo');

            expect(bundle.subjectKey).toBe('AcmeCo');
            expect(bundle.website).toBe('https://acme.example.com');
            expect(bundle.pages).toEqual([
                { url: 'https://acme.example.com', title: 'Acme Co', text: 'Acme builds reusable rockets.' },
                { url: 'https://acme.example.com/about', text: 'About Acme' },
            ]);
            expect(nock.isDone()).toBe(true);
        });

        it('should return the pages gathered so far once the fetch budget is spent', async () => {
            nock('https://acme.example.com')
                .get('/').reply(200, HOMEPAGE)
                .get('/about').delay(200).reply(200, '<html><body><p>About Acme</p></body></html>')
                .get('/team').delay(200).reply(200, '<html><body><p>Team</p></body></html>')
                .get('/careers').delay(200).reply(200, '<html><body><p>Careers</p></body></html>');

            const fetcher = new HttpPageFetcher({
                subjects,
                subpagePaths: ['/about', '/team', '/careers'],
                timeout: 1000,
                budgetMs: 50,
            });
            const bundle = await fetcher.fetch('AcmeCo');

            expect(bundle.pages.map(page => page.url)).toEqual(['https://acme.example.com']);
            expect(console.warn).toHaveBeenCalledWith(
                '[HttpPageFetcher] AcmeCo: fetch budget spent, skipping remaining subpages'
            );
        });

        it('should truncate page text', async () => {
            nock('https://acme.example.com').get('/').reply(200, HOMEPAGE);

            const fetcher = new HttpPageFetcher({ subjects, subpagePaths: [], maxCharsPerPage: 10 });
            const bundle = await fetcher.fetch('AcmeCo');

            expect(bundle.pages[0].text).toBe('Acme build');
        });

        it('should raise a transient error when the homepage is unavailable', async () => {
            nock('https://acme.example.com').get('/').reply(503, 'Service Unavailable');

            const fetcher = new HttpPageFetcher({ subjects, subpagePaths: [] });

            await expect(fetcher.fetch('AcmeCo')).rejects.toMatchObject({
                kind: 'transient',
                code: 'HTTP_503',
                message: 'Fetching https://acme.example.com failed with status 503',
            });
        });

        it('should raise a permanent error when the homepage is missing', async () => {
            nock('https://acme.example.com').get('/').reply(404, 'Not found');

            const fetcher = new HttpPageFetcher({ subjects, subpagePaths: [] });

            await expect(fetcher.fetch('AcmeCo')).rejects.toMatchObject({ kind: 'permanent', code: 'HTTP_404' });
        });

        it('should raise a transient error when the connection fails', async () => {
            nock('https://acme.example.com').get('/').replyWithError('socket hang up');

            const fetcher = new HttpPageFetcher({ subjects, subpagePaths: [] });

            await expect(fetcher.fetch('AcmeCo')).rejects.toMatchObject({ kind: 'transient', code: 'NETWORK_ERROR' });
        });
    });

    describe('resolveWebsite', () => {
        const fetcher = new HttpPageFetcher({ subjects });

        it('should look up known subjects case-insensitively', () => {
            expect(fetcher.resolveWebsite('acmeco')).toBe('https://acme.example.com');
            expect(fetcher.resourceKey('AcmeCo')).toBe('acme.example.com');
        });

        it('should accept URLs and bare domains', () => {
            expect(fetcher.resolveWebsite('https://initech.example.com/home')).toBe('https://initech.example.com/home');
            expect(fetcher.resolveWebsite('globex.io')).toBe('https://globex.io');
            expect(fetcher.resourceKey('globex.io')).toBe('globex.io');
        });

        it('should reject subjects it cannot resolve', () => {
            expect(() => fetcher.resolveWebsite('Some Company')).toThrow(PermanentError);
            expect(() => fetcher.resolveWebsite('Some Company')).toThrow('No website known for subject "Some Company"');
        });
    });

    describe('loadSubjectDirectory', () => {
        let directory: string;

        beforeEach(() => {
            directory = fs.mkdtempSync(path.join(os.tmpdir(), 'subjects-'));
        });

        afterEach(() => {
            fs.rmSync(directory, { recursive: true, force: true });
        });

        it('should read name to URL pairs and skip invalid entries', () => {
            const file = path.join(directory, 'subjects.json');
            fs.writeFileSync(file, JSON.stringify({ AcmeCo: 'https://acme.example.com', Broken: 42 }));

            expect(loadSubjectDirectory(file)).toEqual({ AcmeCo: 'https://acme.example.com' });
        });

        it('should return no subjects when the file is missing', () => {
            expect(loadSubjectDirectory(path.join(directory, 'missing.json'))).toEqual({});
        });

        it('should reject a file that is not a JSON object', () => {
            const file = path.join(directory, 'subjects.json');
            fs.writeFileSync(file, '["AcmeCo"]');

            expect(() => loadSubjectDirectory(file)).toThrow('must contain a JSON object');
        });
    });
});
