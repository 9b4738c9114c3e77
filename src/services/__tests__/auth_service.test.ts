import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import jwt from 'jsonwebtoken';

import { InMemoryUserRepository } from '../../test/fakes';
import { User } from '../../types';
import { AuthenticationError, ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { AuthService, hashPassword } from '../auth_service';

const config = { jwtSecret: 'test-secret', tokenTtlMinutes: 30 };

async function setup() {
    const users = new InMemoryUserRepository();
    const auth = new AuthService(users, config);
    const admin = await users.create({
        username: 'root',
        email: 'root@example.com',
        full_name: 'Root User',
        hashed_password: await hashPassword('password123'),
        role: 'superadmin',
        created_by_id: null,
    });
    return { users, auth, admin };
}

describe('AuthService tokens', () => {
    it('issues a token carrying username, id and role', async () => {
        const { auth, admin } = await setup();
        const claims = auth.verifyToken(auth.issueToken(admin));
        assert.deepEqual(claims, { sub: 'root', user_id: admin.id, role: 'superadmin' });
    });

    it('rejects a token signed with another secret', async () => {
        const { auth } = await setup();
        const forged = jwt.sign({ sub: 'root', user_id: 1, role: 'superadmin' }, 'other-secret');
        assert.throws(() => auth.verifyToken(forged), AuthenticationError);
    });

    it('rejects a valid token once the user is disabled', async () => {
        const { auth, admin, users } = await setup();
        const token = auth.issueToken(admin);
        assert.equal((await auth.authenticate(token)).id, admin.id);

        await users.update(admin.id, { is_disabled: true }, new Date());
        await assert.rejects(auth.authenticate(token), AuthenticationError);
    });
});

describe('AuthService.login', () => {
    it('returns a bearer token and records the login time', async () => {
        const { auth, users, admin } = await setup();
        const result = await auth.login('root', 'password123');

        assert.equal(result.token_type, 'bearer');
        assert.equal(result.expires_in, 1800);
        assert.equal(result.user.username, 'root');
        assert.equal('hashed_password' in result.user, false);
        assert.notEqual((await users.findById(admin.id))?.last_login, null);
    });

    it('rejects a wrong password or unknown user with the same message', async () => {
        const { auth } = await setup();
        await assert.rejects(auth.login('root', 'wrong-password'), { message: 'Incorrect username or password' });
        await assert.rejects(auth.login('nobody', 'password123'), { message: 'Incorrect username or password' });
    });

    it('rejects a disabled account', async () => {
        const { auth, users, admin } = await setup();
        await users.update(admin.id, { is_disabled: true }, new Date());
        await assert.rejects(auth.login('root', 'password123'), { message: 'User account is disabled' });
    });
});

describe('AuthService.changePassword', () => {
    async function currentAdmin(users: InMemoryUserRepository, id: number): Promise<User> {
        const user = await users.findById(id);
        assert.ok(user);
        return user;
    }

    it('requires the current password, a matching confirmation and 8 characters', async () => {
        const { auth, users, admin } = await setup();
        await assert.rejects(auth.changePassword(admin, 'nope', 'new-password', 'new-password'), { message: 'Validation errors: Current password is incorrect' });
        await assert.rejects(auth.changePassword(admin, 'password123', 'new-password', 'other-password'), ValidationError);
        await assert.rejects(auth.changePassword(admin, 'password123', 'short', 'short'), ValidationError);

        await auth.changePassword(await currentAdmin(users, admin.id), 'password123', 'new-password', 'new-password');
        await auth.login('root', 'new-password');
    });
});

describe('AuthService user management', () => {
    it('creates users and refuses duplicates', async () => {
        const { auth, admin } = await setup();
        const officer = await auth.createUser(
            { username: 'officer', email: 'officer@example.com', full_name: 'Loan Officer', password: 'password123', role: 'loan_officer' },
            admin,
        );
        assert.equal(officer.created_by_id, admin.id);

        await assert.rejects(
            auth.createUser({ username: 'officer', email: 'other@example.com', full_name: 'X', password: 'password123', role: 'loan_officer' }, admin),
            { message: 'Username already registered' },
        );
        await assert.rejects(
            auth.createUser({ username: 'other', email: 'officer@example.com', full_name: 'X', password: 'password123', role: 'loan_officer' }, admin),
            ConflictError,
        );
    });

    it('filters and paginates the user list', async () => {
        const { auth, admin } = await setup();
        for (const name of ['a1', 'a2', 'a3']) {
            await auth.createUser({ username: name, email: `${name}@example.com`, full_name: name, password: 'password123', role: 'loan_officer' }, admin);
        }

        const page = await auth.listUsers({ role: 'loan_officer' }, 1, 2);
        assert.equal(page.total_count, 3);
        assert.equal(page.items.length, 2);
        assert.equal(page.has_more, true);
    });

    it('will not let a user disable or delete themselves', async () => {
        const { auth, admin } = await setup();
        await assert.rejects(auth.updateUser(admin.id, { is_disabled: true }, admin), { message: 'Validation errors: You cannot disable your own account' });
        await assert.rejects(auth.disableUser(admin.id, admin), { message: 'Validation errors: You cannot delete your own account' });
    });

    it('deleting a user disables the account', async () => {
        const { auth, admin } = await setup();
        const officer = await auth.createUser(
            { username: 'officer', email: 'officer@example.com', full_name: 'Loan Officer', password: 'password123', role: 'loan_officer' },
            admin,
        );

        const disabled = await auth.disableUser(officer.id, admin);
        assert.equal(disabled.is_disabled, true);
        assert.equal(disabled.is_active, false);
        await assert.rejects(auth.disableUser(999, admin), NotFoundError);
    });
});
