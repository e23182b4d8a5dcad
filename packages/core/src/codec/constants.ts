/** Every packet on the wire has exactly this many bytes. */
export const PACKET_SIZE = 1400;

export const EPHEMERAL_KEY_BYTES = 32;
export const NONCE_BYTES = 24;
export const MAC_BYTES = 16;
export const HEADER_BYTES = EPHEMERAL_KEY_BYTES + NONCE_BYTES;

/** kind (1) | next-hop address (32) | body length (2) */
export const ROUTING_BYTES = 35;

/** Bytes one onion layer costs: header, MAC and routing slot. */
export const HOP_OVERHEAD = HEADER_BYTES + MAC_BYTES + ROUTING_BYTES;

/** Plaintext carried inside each layer's box. */
export const LAYER_PLAINTEXT_BYTES = PACKET_SIZE - HEADER_BYTES - MAC_BYTES;

export const SESSION_ID_BYTES = 16;

/** session id (16) | sequence (4) | flags (1) | route count (1) */
export const DELIVER_HEADER_BYTES = SESSION_ID_BYTES + 4 + 1 + 1;

/** session id (16) | count (1) */
export const ACK_HEADER_BYTES = SESSION_ID_BYTES + 1;

export const MAX_ACK_SEQUENCES = 255;
export const MAX_ROUTE_ADDRESSES = 255;
export const MAX_SEQUENCE = 0xffff_ffff;

export const PacketKind = {
  FORWARD: 0x01,
  DELIVER: 0x02,
  ACK: 0x03,
} as const;
export type PacketKind = (typeof PacketKind)[keyof typeof PacketKind];

export const FrameFlags = {
  OPEN: 0x01,
  END_OF_MESSAGE: 0x02,
  CLOSE: 0x04,
  /** First fragment of a message; lets a receiver resynchronize after lost sequences */
  START_OF_MESSAGE: 0x08,
} as const;

export const KNOWN_FLAGS =
  FrameFlags.OPEN | FrameFlags.END_OF_MESSAGE | FrameFlags.CLOSE | FrameFlags.START_OF_MESSAGE;
