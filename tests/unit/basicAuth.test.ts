import { checkBasicAuth } from '@/http/basicAuth.middleware';

const credentials = { username : 'judge', password : 'test-secret' };
const header = (value : string) => `Basic ${Buffer.from(value).toString('base64')}`;

describe('checkBasicAuth', () => {
    it('accepts the configured credentials', () => {
        expect(checkBasicAuth(header('judge:test-secret'), credentials)).toBe(true);
    });

    it('accepts a password containing a colon', () => {
        expect(checkBasicAuth(header('judge:a:b'), { username : 'judge', password : 'a:b' })).toBe(true);
    });

    it.each([
        ['no header', undefined],
        ['a wrong password', header('judge:guess')],
        ['a wrong user', header('admin:test-secret')],
        ['no separator', header('judgetest-secret')],
        ['another scheme', 'Bearer abc'],
        ['an empty value', 'Basic'],
    ])('rejects %s', (_, value) => {
        expect(checkBasicAuth(value, credentials)).toBe(false);
    });
});
