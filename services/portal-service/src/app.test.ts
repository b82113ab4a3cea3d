import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { logger } from '@loginwall/service-template';
import { createPortalApp } from './app';
import { loadPortalConfig } from './config';

describe('portal app', () => {
    let server: Server;
    let client: AxiosInstance;

    beforeAll(async () => {
        logger.silent = true;
        const app = createPortalApp(loadPortalConfig({ ACCESS_TOKENS: 'test-token', CHALLENGE_REALM: 'test' }));
        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Server has no TCP address');
        }
        client = axios.create({
            baseURL: `http://127.0.0.1:${address.port}`,
            responseType: 'text',
            validateStatus: () => true
        });
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
        logger.silent = false;
    });

    it('should show the login page to a browser with status 200', async () => {
        const res = await client.get('/app/reports', { headers: { Accept: 'text/html,*/*' } });

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toBe('text/html');
        expect(res.data).toContain('<body data-auth-reason="required">');
        expect(res.data).toContain('<p class="sign-in-elsewhere">Signing in is handled by your identity provider.');
        expect(res.data).not.toContain('<form');
    });

    it('should answer a scripted client with the JSON payload and status 400', async () => {
        const res = await client.post('/api/profile', undefined, { headers: { Accept: 'application/json' } });

        expect(res.status).toBe(400);
        expect(res.data).toBe('{"authReason":"required"}');
        expect(res.headers['content-length']).toBe('25');
        expect(res.headers['cache-control']).toBe('no-cache');
    });

    it('should report notPermitted when a token was presented and refused', async () => {
        const res = await client.get('/api/profile', {
            headers: { Accept: 'application/json', Authorization: 'Bearer wrong-token' }
        });

        expect(res.status).toBe(400);
        expect(res.data).toBe('{"authReason":"notPermitted"}');
    });

    it('should challenge methods other than GET and POST', async () => {
        const res = await client.put('/app/reports', undefined, { headers: { Accept: 'text/html' } });

        expect(res.status).toBe(401);
        expect(res.headers['www-authenticate']).toBe('Basic realm="test"');
    });

    it('should serve protected routes to an accepted token', async () => {
        const res = await client.get('/app/profile', { headers: { Authorization: 'Bearer test-token' } });

        expect(res.status).toBe(200);
        expect(res.data).toBe('<!doctype html><title>Profile</title><h1>Profile</h1>');
    });

    it('should serve the login page directly with empty placeholders', async () => {
        const res = await client.get('/login.html');

        expect(res.status).toBe(200);
        expect(res.data).toContain('<body data-auth-reason="">');
        expect(res.data).toContain('<p><a href="">Continue</a></p>');
    });

    it('should leave unknown pages to the default 404', async () => {
        const res = await client.get('/missing.html');

        expect(res.status).toBe(404);
    });

    it('should answer the health check', async () => {
        const res = await client.get('/health');

        expect(res.status).toBe(200);
        expect(JSON.parse(res.data)).toMatchObject({ status: 'ok', service: 'portal-service' });
    });
});
