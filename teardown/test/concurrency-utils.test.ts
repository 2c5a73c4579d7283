import { backoffDelay, withExponentialBackoff } from '../lib/concurrency/utils';

const makeError = (name: string) => Object.assign(new Error(name), { name });

describe('withExponentialBackoff', () => {
    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('retries listed errors until the call succeeds', async () => {
        // GIVEN
        const fn = jest.fn<Promise<string>, []>()
            .mockRejectedValueOnce(makeError('ThrottlingException'))
            .mockRejectedValueOnce(makeError('ThrottlingException'))
            .mockResolvedValue('done');

        // WHEN
        const result = await withExponentialBackoff(5, ['ThrottlingException'], fn, 1);

        // THEN
        expect(result).toBe('done');
        expect(fn).toHaveBeenCalledTimes(3);
        expect(console.warn).toHaveBeenCalledWith('ThrottlingException encountered. Retrying...');
    });

    test('gives up after the maximum number of retries', async () => {
        // GIVEN
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(makeError('ThrottlingException'));

        // WHEN / THEN
        await expect(withExponentialBackoff(2, ['ThrottlingException'], fn, 1)).rejects.toThrow('ThrottlingException');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    test('does not retry other errors', async () => {
        // GIVEN
        const fn = jest.fn<Promise<string>, []>().mockRejectedValue(makeError('ValidationError'));

        // WHEN / THEN
        await expect(withExponentialBackoff(5, ['ThrottlingException'], fn, 1)).rejects.toThrow('ValidationError');
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('backoffDelay', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('doubles the ceiling with each attempt', () => {
        jest.spyOn(Math, 'random').mockReturnValue(0.5);

        expect(backoffDelay(0, 100)).toBe(100);
        expect(backoffDelay(1, 100)).toBe(200);
        expect(backoffDelay(3, 100)).toBe(800);
    });

    test('never exceeds five seconds', () => {
        jest.spyOn(Math, 'random').mockReturnValue(0.999);

        expect(backoffDelay(10, 100)).toBeCloseTo(4995);
    });
});
