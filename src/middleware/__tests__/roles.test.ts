import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CAPABILITIES, capabilitiesOf, hasCapability } from '../roles';

describe('role capabilities', () => {
    it('grants the superadmin everything', () => {
        assert.deepEqual(capabilitiesOf('superadmin'), [...CAPABILITIES]);
    });

    it('lets a bank manager review and tune but not manage users', () => {
        assert.equal(hasCapability('bank_manager', 'applications:review'), true);
        assert.equal(hasCapability('bank_manager', 'weights:manage'), true);
        assert.equal(hasCapability('bank_manager', 'model:manage'), true);
        assert.equal(hasCapability('bank_manager', 'audit:read'), true);
        assert.equal(hasCapability('bank_manager', 'users:manage'), false);
    });

    it('limits a loan officer to submitting and reading applications', () => {
        assert.deepEqual(capabilitiesOf('loan_officer'), ['applications:submit', 'applications:read']);
    });
});
