/**
 * Message definitions shared by the wire-format integration tests.
 *
 * These model a small sensor protocol: a fixed header, optional samples,
 * and a command union.
 */

import {
  array,
  bool,
  f32,
  i16,
  option,
  struct,
  taggedUnion,
  u16,
  u32,
  u64,
  u8,
  unit,
  unitEnum,
} from '../../../typescript/src';
import type { Infer } from '../../../typescript/src';

export const Status = struct({ flag: bool, count: u16 });
export type Status = Infer<typeof Status>;

export const Command = taggedUnion({ A: unit, B: u32 });
export type Command = Infer<typeof Command>;

export const Reading = struct({ sensor: u8, celsius: f32, timestamp: u64 });
export type Reading = Infer<typeof Reading>;

export const PacketKind = unitEnum(['Ping', 'Data', 'Ack']);

export const Header = struct({ version: u8, kind: PacketKind, seq: u32, length: u16 });
export type Header = Infer<typeof Header>;

export const Packet = struct({ header: Header, samples: option(array(i16, 3)) });
export type Packet = Infer<typeof Packet>;
