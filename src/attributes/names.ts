/** Attribute names this library gives meaning to. */
export const ATTR = {
  /** Database STRING. `J1939` selects the J1939 identifier layout. */
  ProtocolType: 'ProtocolType',
  /** Database INT/ENUM. 1 selects the GM Parameter ID layout. */
  UseGMParameterIDs: 'UseGMParameterIDs',
  /** Message ENUM. `J1939PG` selects the J1939 layout for one message. */
  VFrameFormat: 'VFrameFormat',
  /** Signal INT. Raw value used when a message is encoded without this signal. */
  GenSigStartValue: 'GenSigStartValue',
  /** Node HEX. Source address the node transmits with. */
  TpTxIdentifier: 'TpTxIdentifier',
  GenMsgCycleTime: 'GenMsgCycleTime',
  BusType: 'BusType',
} as const;

export const J1939_FRAME_FORMAT = 'J1939PG';
