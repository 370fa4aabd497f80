import type { Message, MultiplexerRole, Signal } from './types';

/** The message's multiplexor signal, if it has one. */
export function findMultiplexor(message: Message): Signal | undefined {
  return message.signals.find(s => s.multiplexer.kind === 'IsMultiplexor');
}

/** Whether the signal is present in a frame whose multiplexor reads `switchValue`. */
export function isActiveFor(role: MultiplexerRole, switchValue: number | undefined): boolean {
  switch (role.kind) {
    case 'None':
    case 'IsMultiplexor':
      return true;
    case 'MultiplexedBy':
      return switchValue === role.switchValue;
    case 'MultiplexedByRange': {
      if (switchValue === undefined) return false;
      const value: number = switchValue;
      return role.ranges.some(r => value >= r.lower && value <= r.upper);
    }
  }
}

/** Whether two signals can both be present in the same frame. */
export function canCoexist(a: MultiplexerRole, b: MultiplexerRole): boolean {
  const aRanges = switchRanges(a);
  const bRanges = switchRanges(b);
  if (aRanges === 'always' || bRanges === 'always') {
    return true;
  }
  return aRanges.some(x => bRanges.some(y => x.lower <= y.upper && y.lower <= x.upper));
}

function switchRanges(role: MultiplexerRole): 'always' | Array<{ lower: number; upper: number }> {
  switch (role.kind) {
    case 'None':
    case 'IsMultiplexor':
      return 'always';
    case 'MultiplexedBy':
      return [{ lower: role.switchValue, upper: role.switchValue }];
    case 'MultiplexedByRange':
      return role.ranges.map(r => ({ lower: r.lower, upper: r.upper }));
  }
}
