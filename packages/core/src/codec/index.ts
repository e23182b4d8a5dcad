export {
  ACK_HEADER_BYTES,
  DELIVER_HEADER_BYTES,
  FrameFlags,
  HOP_OVERHEAD,
  MAX_ACK_SEQUENCES,
  PACKET_SIZE,
  PacketKind,
} from './constants.js';
export type { AckFrame, DeliverFrame } from './frames.js';
export { PacketCodec } from './packet-codec.js';
export type {
  AcknowledgementUnit,
  DecodedUnit,
  DeliverPayload,
  DeliveryMeta,
  ForwardInstruction,
} from './packet-codec.js';
