import { FixClient, FixApiError, UnauthorizedError } from '../../src/api/fix_client';
import { EnpTarget } from '../../src/domain/enp_profile';
import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';

describe('FixClient', () => {
    let mock: MockAdapter;
    let client: FixClient;
    const apiToken = 'test-token';
    const baseUrl = 'https://fix.test';

    beforeEach(() => {
        mock = new MockAdapter(axios);
        client = new FixClient(apiToken, baseUrl);
    });

    afterEach(() => {
        mock.restore();
    });

    test('fixEnp: sends token header and snake_case body', async () => {
        mock.onPost('/fix/enp').reply(config => {
            expect(config.headers?.['x-api-token']).toBe(apiToken);
            expect(JSON.parse(config.data)).toEqual({ input: '0412345678', dry_run: true, enp_target: 'NXP2' });
            return [200, { dry_run: true, enp_target: 'NXP2', count: 1, system_id: 510, nprn: 98019 }];
        });

        const result = await client.fixEnp('0412345678', { dryRun: true, enpTarget: EnpTarget.NXP2 });

        expect(result.system_id).toBe(510);
    });

    test('fixNprn: defaults to a live call for NXP1', async () => {
        mock.onPost('/fix/nprn').reply(config => {
            expect(JSON.parse(config.data)).toEqual({ input: '0412345678', dry_run: false, enp_target: 'NXP1' });
            return [200, { dry_run: false, redis_db: 9, deleted_counts: [1] }];
        });

        const result = await client.fixNprn('0412345678');

        expect(result.deleted_counts).toEqual([1]);
    });

    test('Error Mapping: 401 becomes UnauthorizedError', async () => {
        mock.onPost('/fix/disp').reply(401, { error: 'UNAUTHORIZED', message: 'Unauthorized' });

        await expect(client.fixDisp('0412345678')).rejects.toThrow(UnauthorizedError);
    });

    test('Error Mapping: 400 keeps the error kind and message', async () => {
        mock.onPost('/fix/enp').reply(400, { error: 'RANGE_TOO_LARGE', message: 'Range too large (>100)' });

        await expect(client.fixEnp('0412345600-700')).rejects.toMatchObject({
            statusCode: 400,
            kind: 'RANGE_TOO_LARGE',
            message: 'Range too large (>100)',
        });
    });

    test('Error Mapping: body without message', async () => {
        mock.onPost('/fix/nprn').reply(500);

        await expect(client.fixNprn('0412345678')).rejects.toThrow(FixApiError);
        await expect(client.fixNprn('0412345678')).rejects.toThrow('API Error: 500');
    });
});
