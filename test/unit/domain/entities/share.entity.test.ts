import { buildShare, generateShareToken } from '../../../../src/core/domain/entities/share.entity';

describe('Share entity', () => {
    it('should generate 10 lowercase hex characters', () => {
        expect(generateShareToken()).toMatch(/^[0-9a-f]{10}$/);
    });

    it('should generate a different token on each call', () => {
        expect(generateShareToken()).not.toBe(generateShareToken());
    });

    it('should build a share record stamped with the creation time', () => {
        const now = new Date('2024-06-15T12:00:00.000Z');

        expect(buildShare('c1', 'a1b2c3d4e5', now)).toEqual({
            client_id: 'c1',
            token: 'a1b2c3d4e5',
            created_at: now
        });
    });
});
