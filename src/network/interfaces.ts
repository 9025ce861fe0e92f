import * as os from 'os';

export interface InterfaceAddress {
    name: string;
    address: string;
}

export const listIPv4Interfaces = (): InterfaceAddress[] => {
    const result: InterfaceAddress[] = [];
    const interfaces = os.networkInterfaces();
    for (const name of Object.keys(interfaces)) {
        for (const iface of interfaces[name] || []) {
            if (iface.family === 'IPv4' && !iface.internal) {
                result.push({ name, address: iface.address });
            }
        }
    }
    return result;
};

export const primaryAddress = (): string => listIPv4Interfaces()[0]?.address ?? '127.0.0.1';

export const normalizeAddress = (address: string | undefined): string => {
    return address?.replace('::ffff:', '') || '127.0.0.1';
};
