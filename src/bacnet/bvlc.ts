/**
 * BACnet Virtual Link Control (Annex J) frames used by the bridge
 */

export const BVLC_TYPE_BACNET_IP = 0x81;

export const BvlcFunction = {
  REGISTER_FOREIGN_DEVICE: 0x05
} as const;

const REGISTER_FOREIGN_DEVICE_LENGTH = 6;

/**
 * Register-Foreign-Device: 0x81 0x05 <length:2> <ttl:2>, big-endian.
 * A TTL of 0 asks the BBMD to drop the registration.
 */
export function encodeRegisterForeignDevice(ttl: number): Buffer {
  if (!Number.isInteger(ttl) || ttl < 0 || ttl > 0xffff) {
    throw new RangeError(`TTL must be an integer between 0 and 65535, got ${ttl}`);
  }
  const frame = Buffer.alloc(REGISTER_FOREIGN_DEVICE_LENGTH);
  frame.writeUInt8(BVLC_TYPE_BACNET_IP, 0);
  frame.writeUInt8(BvlcFunction.REGISTER_FOREIGN_DEVICE, 1);
  frame.writeUInt16BE(REGISTER_FOREIGN_DEVICE_LENGTH, 2);
  frame.writeUInt16BE(ttl, 4);
  return frame;
}
