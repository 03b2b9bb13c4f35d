import { describe, it, expect } from 'vitest';
import { ClaimSet, kvFinder, matchTarget, stripContainerName } from '../../../src/discovery/matcher';
import { createDirective, createSnapshot } from '../../helpers/mockHelpers';

describe('discovery/matcher - kvFinder', () => {
    it.each([
        ['contains', 'redis:6.2', 'redis', true],
        ['contains', 'postgres:14', 'redis', false],
        ['prefix', 'redis:6.2', 'redis', true],
        ['prefix', 'bitnami/redis', 'redis', false],
        ['suffix', 'bitnami/redis', 'redis', true],
        ['regex', 'cache-12', '^cache-\\d+$', true],
        ['regex', 'cache-x', '^cache-\\d+$', false],
        ['equal', 'redis', 'redis', true],
        ['equal', 'redis:6.2', 'redis', false],
    ])('%s: %s against %s is %s', (mode, value, wanted, expected) => {
        expect(kvFinder(mode, value, wanted)).toBe(expected);
    });

    it('never matches an invalid regular expression', () => {
        expect(kvFinder('regex', 'anything', '(')).toBe(false);
    });
});

describe('discovery/matcher - stripContainerName', () => {
    it('removes one leading slash', () => {
        expect(stripContainerName('/cache-1')).toBe('cache-1');
        expect(stripContainerName('cache-1')).toBe('cache-1');
    });
});

describe('discovery/matcher - matchTarget', () => {
    it('matches images with the contains mode', () => {
        const claims = new ClaimSet();
        const directive = createDirective({ target: 'redis', targetType: 'image', targetMode: 'contains' });

        expect(matchTarget(directive, createSnapshot({ id: 'r1', image: 'redis:6.2' }), claims)).toBe(true);
        expect(matchTarget(directive, createSnapshot({ id: 'p1', image: 'postgres:14' }), claims)).toBe(false);
    });

    it('records a matched container in the claim set', () => {
        const claims = new ClaimSet();
        matchTarget(createDirective(), createSnapshot({ id: 'r1', image: 'redis:6.2' }), claims);

        expect(claims.has('r1')).toBe(true);
        expect(claims.size).toBe(1);
    });

    it('leaves the claim set alone when nothing matches', () => {
        const claims = new ClaimSet();
        matchTarget(createDirective(), createSnapshot({ id: 'p1', image: 'postgres:14' }), claims);

        expect(claims.size).toBe(0);
    });

    it('never matches an already claimed container', () => {
        const claims = new ClaimSet();
        claims.claim('r1');

        const container = createSnapshot({ id: 'r1', image: 'redis:6.2', names: ['/redis'] });
        expect(matchTarget(createDirective(), container, claims)).toBe(false);
        expect(matchTarget(createDirective({ targetType: 'containerName', targetMode: 'equal' }), container, claims)).toBe(false);
    });

    it('matches container names without their leading slash', () => {
        const claims = new ClaimSet();
        const directive = createDirective({ target: 'cache-1', targetType: 'containerName', targetMode: 'equal' });

        expect(matchTarget(directive, createSnapshot({ id: 'c1', names: ['/cache-1'] }), claims)).toBe(true);
    });

    it('falls back to the Kubernetes container name label', () => {
        const claims = new ClaimSet();
        const directive = createDirective({ target: 'redis', targetType: 'containerName' });
        const container = createSnapshot({
            id: 'k1',
            names: ['/k8s_POD_redis-0_default'],
            labels: { 'io.kubernetes.container.name': 'redis-master' }
        });

        expect(matchTarget(createDirective({ target: 'redis-master', targetType: 'containerName', targetMode: 'equal' }), container, claims)).toBe(true);
        expect(matchTarget(directive, createSnapshot({ id: 'k2', names: ['/other'] }), claims)).toBe(false);
    });

    it('does not compare the image when targeting container names', () => {
        const claims = new ClaimSet();
        const directive = createDirective({ target: 'redis', targetType: 'containerName' });

        expect(matchTarget(directive, createSnapshot({ id: 'r1', names: ['/db'], image: 'redis:6.2' }), claims)).toBe(false);
    });

    it('never matches with an unknown target type', () => {
        const claims = new ClaimSet();
        const directive = createDirective({ targetType: undefined });

        expect(matchTarget(directive, createSnapshot({ id: 'r1', image: 'redis:6.2' }), claims)).toBe(false);
    });
});
