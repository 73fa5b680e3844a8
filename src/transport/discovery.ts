export interface SerialCandidate {
	path: string;
	manufacturer?: string;
	serialNumber?: string;
	pnpId?: string;
	vendorId?: string;
	productId?: string;
}

export interface UsbIdentity {
	vendorId: string;
	productId: string;
}

/** USB identity the tape firmware enumerates with. */
export const TAPE_USB_IDENTITY: UsbIdentity = {
	vendorId: '1d50',
	productId: '605e'
};

export async function listSerialCandidates(): Promise<SerialCandidate[]> {
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('serialport') as {
			SerialPort?: { list: () => Promise<SerialCandidate[]> };
		};
		if (!mod.SerialPort || typeof mod.SerialPort.list !== 'function') {
			return [];
		}

		return await mod.SerialPort.list();
	} catch {
		return [];
	}
}

function normalizeUsbId(value: string | undefined): string {
	return (value ?? '').trim().toLowerCase().replace(/^0x/, '');
}

export function matchesUsbIdentity(candidate: SerialCandidate, identity: UsbIdentity): boolean {
	return (
		normalizeUsbId(candidate.vendorId) === normalizeUsbId(identity.vendorId) &&
		normalizeUsbId(candidate.productId) === normalizeUsbId(identity.productId)
	);
}

/**
 * Paths of attached serial devices that look like an LED tape, in listing order.
 */
export async function listTapePorts(identity: UsbIdentity = TAPE_USB_IDENTITY): Promise<string[]> {
	const candidates = await listSerialCandidates();
	return candidates.filter((candidate) => matchesUsbIdentity(candidate, identity)).map((candidate) => candidate.path);
}
