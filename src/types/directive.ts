export const TARGET_TYPES = ['containerName', 'image'] as const;
export type TargetType = typeof TARGET_TYPES[number];

export const IP_MODES = ['private', 'public'] as const;
export type IpMode = typeof IP_MODES[number];

export function isIpMode(value: string | undefined): value is IpMode {
    return value === 'private' || value === 'public';
}

/**
 * A parsed discovery advertisement taken from one annotation entry.
 */
export type Directive = {
    /** Annotation key the directive was read from */
    key: string;
    target: string;
    configName: string;
    reverse: boolean;
    /** Undefined when the annotation named a target type we do not know */
    targetType?: TargetType;
    targetMode: string;
    ipMode?: IpMode;
    port?: string;
};
