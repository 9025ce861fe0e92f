import { generateInstanceId } from '../core/config';
import { PeerIdentity } from '../core/types';
import { primaryAddress } from '../network/interfaces';

export const MAX_DISPLAY_NAME_BYTES = 64;

// C0/C1 control characters would let a peer rewrite other people's terminal lines.
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/;

export const validateDisplayName = (name: string): string => {
    const trimmed = name.trim();
    if (trimmed.length === 0) throw new Error('Display name must not be empty');
    if (CONTROL_CHARS.test(trimmed)) throw new Error('Display name must not contain control characters');
    if (Buffer.byteLength(trimmed, 'utf8') > MAX_DISPLAY_NAME_BYTES) {
        throw new Error(`Display name must be at most ${MAX_DISPLAY_NAME_BYTES} bytes`);
    }
    return trimmed;
};

/**
 * This process's identity. The instance id is fresh on every start and is
 * never written anywhere, so two instances sharing a name stay distinct.
 */
export const createLocalIdentity = (displayName: string, address: string = primaryAddress()): PeerIdentity => {
    return Object.freeze({
        displayName: validateDisplayName(displayName),
        address,
        instanceId: generateInstanceId(),
    });
};
