/**
 * Route-level tests: the real Express app on an ephemeral loopback port, backed by in-memory repositories.
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Server } from 'node:http';

import { createApp } from '../../app';
import { createContext } from '../../context';
import { LlmExplainer } from '../../engines/llm_explainer';
import { LoanPredictor } from '../../engines/prediction/predictor';
import { hashPassword } from '../../services/auth_service';
import {
    InMemoryAuditRepository, InMemoryLoanRepository, InMemoryUserRepository, InMemoryWeightRepository, sampleApplication,
} from '../../test/fakes';
import { UserRole } from '../../types';

const PASSWORD = 'password123';

const users = new InMemoryUserRepository();
const loans = new InMemoryLoanRepository();
const audit = new InMemoryAuditRepository(users);
const artifactPaths = { modelPath: 'missing/model.json', preprocessorPath: 'missing/preprocessor.json' };

const ctx = createContext({
    repositories: { loans, users, audit, weights: new InMemoryWeightRepository() },
    predictor: new LoanPredictor(artifactPaths),
    explainer: new LlmExplainer({}),
    artifactPaths,
    auth: { jwtSecret: 'test-secret', tokenTtlMinutes: 30 },
    http: { nodeEnv: 'test', corsOrigin: '*', rateLimitMax: 1000 },
});

let server: Server;
let baseUrl = '';

async function call(method: string, path: string, options: { token?: string; body?: unknown } = {}) {
    const headers: Record<string, string> = {};
    if (options.token) headers.Authorization = `Bearer ${options.token}`;
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';

    const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
}

async function addUser(username: string, role: UserRole) {
    return users.create({
        username,
        email: `${username}@example.com`,
        full_name: username,
        hashed_password: await hashPassword(PASSWORD),
        role,
        created_by_id: null,
    });
}

async function tokenFor(username: string): Promise<string> {
    const { status, body } = await call('POST', '/api/v1/auth/login', { body: { username, password: PASSWORD } });
    assert.equal(status, 200);
    assert.ok(typeof body === 'object' && body !== null && 'access_token' in body && typeof body.access_token === 'string');
    return body.access_token;
}

function field(body: unknown, key: string): unknown {
    return typeof body === 'object' && body !== null && key in body ? Reflect.get(body, key) : undefined;
}

before(async () => {
    await addUser('root', 'superadmin');
    await addUser('manager', 'bank_manager');
    await addUser('officer', 'loan_officer');
    server = createApp(ctx).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

describe('public endpoints', () => {
    it('reports health without a token', async () => {
        const { status, body } = await call('GET', '/health');
        assert.equal(status, 200);
        assert.equal(field(body, 'status'), 'ok');
        assert.equal(field(body, 'prediction_method'), 'rule_based');
        assert.deepEqual(field(body, 'feature_weights'), { available: true, active_count: 0 });
    });

    it('answers unknown routes with 404', async () => {
        const { status, body } = await call('GET', '/api/v1/nothing-here');
        assert.equal(status, 404);
        assert.equal(field(body, 'code'), 'NOT_FOUND');
    });

    it('rejects bad credentials and audits the attempt', async () => {
        const { status } = await call('POST', '/api/v1/auth/login', { body: { username: 'officer', password: 'wrong-password' } });
        assert.equal(status, 401);
        assert.ok(audit.rows.some(e => e.action === 'login_failed' && e.details === 'username=officer'));
    });
});

describe('loan endpoints', () => {
    it('requires a token', async () => {
        const { status } = await call('POST', '/api/v1/loans/predict', { body: sampleApplication() });
        assert.equal(status, 401);
    });

    it('scores an application for a loan officer', async () => {
        const token = await tokenFor('officer');
        const { status, body } = await call('POST', '/api/v1/loans/predict', { token, body: sampleApplication() });

        assert.equal(status, 200);
        assert.equal(field(body, 'loan_decision'), 'Yes');
        assert.equal(field(body, 'risk_score'), 11);
        assert.equal(field(body, 'risk_category'), 'Low');
        assert.ok(audit.rows.some(e => e.action === 'loan_prediction' && e.resource_id === field(body, 'application_id')));
    });

    it('returns every validation issue with 422', async () => {
        const token = await tokenFor('officer');
        const { status, body } = await call('POST', '/api/v1/loans/predict', {
            token,
            body: { ...sampleApplication(), applicant_income: 1000, loan_amount: 300 },
        });

        assert.equal(status, 422);
        assert.equal(field(body, 'code'), 'VALIDATION_ERROR');
        assert.deepEqual(field(body, 'details'), ['EMI to income ratio is too high (>80%)']);
    });

    it('keeps admin decisions away from loan officers', async () => {
        const token = await tokenFor('officer');
        const { status } = await call('PUT', '/api/v1/loans/applications/LOAN_X/admin-decision', { token, body: { final_status: 'Yes' } });
        assert.equal(status, 403);
    });

    it('lets a bank manager override a prediction', async () => {
        const token = await tokenFor('manager');
        const predicted = await call('POST', '/api/v1/loans/predict', { token, body: sampleApplication() });
        const id = String(field(predicted.body, 'application_id'));

        const decided = await call('PUT', `/api/v1/loans/applications/${id}/admin-decision`, {
            token,
            body: { final_status: 'No', admin_notes: 'Collateral missing' },
        });
        assert.equal(decided.status, 200);

        const fetched = await call('GET', `/api/v1/loans/applications/${id}`, { token });
        assert.equal(fetched.status, 200);
        assert.equal(field(fetched.body, 'final_status'), 'No');
        assert.equal(field(fetched.body, 'admin_notes'), 'Collateral missing');
    });

    it('answers 404 for an unknown application', async () => {
        const token = await tokenFor('manager');
        const { status } = await call('GET', '/api/v1/loans/applications/LOAN_MISSING', { token });
        assert.equal(status, 404);
    });
});

describe('admin endpoints', () => {
    it('forbids the dashboard to loan officers', async () => {
        const token = await tokenFor('officer');
        const { status, body } = await call('GET', '/api/v1/admin/dashboard', { token });
        assert.equal(status, 403);
        assert.equal(field(body, 'error'), 'Insufficient permissions');
    });

    it('rejects a feature weight above 10', async () => {
        const token = await tokenFor('manager');
        const { status } = await call('PUT', '/api/v1/admin/feature-weights', { token, body: { feature_name: 'credit_history', weight: 11 } });
        assert.equal(status, 422);
    });

    it('refuses to retrain without enough reviewed applications', async () => {
        const token = await tokenFor('manager');
        const { status, body } = await call('POST', '/api/v1/admin/model/retrain', { token });
        assert.equal(status, 200);
        assert.equal(field(body, 'success'), false);
    });

    it('keeps user management to the superadmin', async () => {
        const managerToken = await tokenFor('manager');
        assert.equal((await call('GET', '/api/v1/users', { token: managerToken })).status, 403);

        const rootToken = await tokenFor('root');
        const listed = await call('GET', '/api/v1/users?role=loan_officer', { token: rootToken });
        assert.equal(listed.status, 200);
        assert.equal(field(listed.body, 'total_count'), 1);
    });
});

describe('disabled accounts', () => {
    it('rejects a previously valid token on every protected endpoint', async () => {
        const user = await addUser('temp', 'bank_manager');
        const token = await tokenFor('temp');
        assert.equal((await call('GET', '/api/v1/auth/me', { token })).status, 200);

        await users.update(user.id, { is_disabled: true }, new Date());

        for (const [method, path] of [
            ['GET', '/api/v1/auth/me'],
            ['POST', '/api/v1/loans/predict'],
            ['GET', '/api/v1/admin/dashboard'],
            ['GET', '/api/v1/admin/feature-weights'],
            ['GET', '/api/v1/jobs'],
        ] as const) {
            const { status } = await call(method, path, { token, body: method === 'POST' ? sampleApplication() : undefined });
            assert.equal(status, 401, `${method} ${path}`);
        }
    });
});
