import { describe, it, expect, afterEach, vi } from 'vitest';
import {
    decodeDirectiveFields,
    parseDirective,
    parseDirectives
} from '../../../src/discovery/directive';
import { captureLogs } from '../../helpers/mockHelpers';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('discovery/directive - decodeDirectiveFields', () => {
    it('decodes the pair-list encoding', () => {
        expect(decodeDirectiveFields('t=redis,c=redis-probe,tm=contains')).toEqual({
            t: 'redis',
            c: 'redis-probe',
            tm: 'contains'
        });
    });

    it('decodes the dotted encoding', () => {
        expect(decodeDirectiveFields('t_redis.tt_img.tm_contains')).toEqual({
            t: 'redis',
            tt: 'img',
            tm: 'contains'
        });
    });

    it('yields the same fields for both encodings', () => {
        expect(decodeDirectiveFields('t_redis.tt_cname.ip_public.p_6379'))
            .toEqual(decodeDirectiveFields('t=redis,tt=cname,ip=public,p=6379'));
    });

    it('prefers the pair-list encoding when the value has "="', () => {
        expect(decodeDirectiveFields('t=redis.cache')).toEqual({ t: 'redis.cache' });
    });

    it('skips segments with no or several assignment characters', () => {
        expect(decodeDirectiveFields('t=redis,broken,x=1=2,c=cfg')).toEqual({ t: 'redis', c: 'cfg' });
        expect(decodeDirectiveFields('t_redis.broken.a_b_c')).toEqual({ t: 'redis' });
    });

    it('returns no fields for values in neither encoding', () => {
        expect(decodeDirectiveFields('redis')).toEqual({});
    });
});

describe('discovery/directive - parseDirective', () => {
    it('applies defaults', () => {
        expect(parseDirective('flexDiscoveryRedis', 't=redis')).toEqual({
            key: 'flexDiscoveryRedis',
            target: 'redis',
            configName: 'redis',
            reverse: false,
            targetType: 'image',
            targetMode: 'contains'
        });
    });

    it('reads every recognised field', () => {
        expect(parseDirective('flexDiscoveryCache', 't=cache,c=redis,r=true,tt=cname,tm=prefix,ip=public,p=6380')).toEqual({
            key: 'flexDiscoveryCache',
            target: 'cache',
            configName: 'redis',
            reverse: true,
            targetType: 'containerName',
            targetMode: 'prefix',
            ipMode: 'public',
            port: '6380'
        });
    });

    it('discards annotations without a target', () => {
        expect(parseDirective('flexDiscoveryRedis', 'c=redis,tm=contains')).toBeUndefined();
        expect(parseDirective('flexDiscoveryRedis', 'nothing-here')).toBeUndefined();
    });

    it('ignores an unknown ip mode', () => {
        expect(parseDirective('k', 't=redis,ip=sideways')?.ipMode).toBeUndefined();
    });

    it('leaves the target type unset for an unknown token', () => {
        const directive = parseDirective('k', 't=redis,tt=hostname');
        expect(directive).toBeDefined();
        expect(directive?.targetType).toBeUndefined();
    });

    it('does not read target types off the object prototype', () => {
        const logs = captureLogs();

        expect(parseDirective('k', 't=redis,tt=constructor')?.targetType).toBeUndefined();
        expect(parseDirective('k', 't=redis,tt=toString')?.targetType).toBeUndefined();
        expect(logs.filter(l => l.message === 'Unknown target type, directive will not match')).toHaveLength(2);
    });

    it('treats anything but "true" as a false reverse flag', () => {
        expect(parseDirective('k', 't=redis,r=yes')?.reverse).toBe(false);
    });
});

describe('discovery/directive - parseDirectives', () => {
    it('only reads keys containing the discovery marker, ordered by key', () => {
        const annotations = new Map([
            ['flexDiscoveryZookeeper', 't=zookeeper'],
            ['com.docker.compose.service', 'web'],
            ['io.flexDiscoveryAlpha', 't_alpha.tt_cname'],
            ['flexDiscoveryBroken', 'c=missing-target'],
        ]);

        const directives = parseDirectives(annotations);

        expect(directives.map(d => d.key)).toEqual(['flexDiscoveryZookeeper', 'io.flexDiscoveryAlpha']);
        expect(directives[1].targetType).toBe('containerName');
    });
});
