/**
 * PEG grammar for Vector DBC files.
 * Compiled by peggy at runtime.
 */
export const DBC_GRAMMAR = `
{
  // Keywords with a rule of their own; anything else ending in ";" is skipped
  var KNOWN = [
    "VERSION", "NS_", "BS_", "BU_", "VAL_TABLE_", "BO_", "SG_", "BO_TX_BU_",
    "EV_", "ENVVAR_DATA_", "CM_", "BA_DEF_", "BA_DEF_DEF_", "BA_", "VAL_",
    "SIG_VALTYPE_", "SG_MUL_VAL_", "SIG_GROUP_"
  ];
}

File
  = _ statements:(s:Statement _ { return s; })*
    {
      return { statements: statements };
    }

Statement
  = Version
  / NewSymbols
  / BitTiming
  / Nodes
  / ValueTable
  / MessageTransmitters
  / Message
  / EnvironmentVariableData
  / EnvironmentVariable
  / Comment
  / AttributeDefault
  / AttributeDefinition
  / AttributeValue
  / ValueDescription
  / SignalValueType
  / SignalMultiplexValues
  / SignalGroup
  / Unknown

Version
  = "VERSION" !IdentChar _ version:String
    {
      return { kind: "Version", version: version };
    }

NewSymbols
  = "NS_" _ ":" symbols:(_ s:NewSymbol { return s; })*
    {
      return { kind: "NewSymbols", symbols: symbols };
    }

NewSymbol
  = !("BS_" !IdentChar) !("BU_" !IdentChar) name:Identifier !(_ ":") { return name; }

BitTiming
  = "BS_" _ ":" timing:(HS* t:BitTimingValues { return t; })?
    {
      var result = { kind: "BitTiming" };
      if (timing) {
        result.baudrate = timing.baudrate;
        if (timing.btr1 !== undefined) { result.btr1 = timing.btr1; result.btr2 = timing.btr2; }
      }
      return result;
    }

BitTimingValues
  = baudrate:UInt registers:(HS* ":" HS* btr1:UInt HS* "," HS* btr2:UInt { return { btr1: btr1, btr2: btr2 }; })?
    {
      return registers
        ? { baudrate: baudrate, btr1: registers.btr1, btr2: registers.btr2 }
        : { baudrate: baudrate };
    }

Nodes
  = "BU_" _ ":" names:(HS* n:Identifier { return n; })*
    {
      return { kind: "Nodes", names: names };
    }

ValueTable
  = "VAL_TABLE_" __ name:Identifier entries:ValueEntries _ ";"
    {
      return { kind: "ValueTable", name: name, entries: entries };
    }

ValueEntries
  = entries:(_ value:Number _ label:String { return { value: value, label: label }; })*
    { return entries; }

Message
  = "BO_" __ id:UInt __ name:Identifier _ ":" _ size:UInt __ transmitter:Identifier
    signals:(_ s:Signal { return s; })*
    {
      return {
        kind: "Message",
        id: id,
        name: name,
        size: size,
        transmitter: transmitter,
        signals: signals
      };
    }

Signal
  = "SG_" __ name:Identifier _ mux:(m:Multiplexer _ { return m; })? ":" _
    startBit:UInt _ "|" _ bitLength:UInt _ "@" _ order:[01] sign:[+-] _
    "(" _ factor:Number _ "," _ scaleOffset:Number _ ")" _
    "[" _ minimum:Number _ "|" _ maximum:Number _ "]" _
    unit:String receivers:(HS* list:NodeList { return list; })?
    {
      return {
        name: name,
        multiplexer: mux,
        startBit: startBit,
        bitLength: bitLength,
        byteOrder: order === "1" ? "little" : "big",
        signed: sign === "-",
        factor: factor,
        offset: scaleOffset,
        minimum: minimum,
        maximum: maximum,
        unit: unit,
        receivers: receivers || []
      };
    }

Multiplexer
  = "M" !IdentChar { return { isMultiplexor: true }; }
  / "m" n:UInt nested:"M"? !IdentChar
    {
      return { isMultiplexor: nested !== null, switchValue: n };
    }

MessageTransmitters
  = "BO_TX_BU_" __ id:UInt _ ":" _ transmitters:NodeList? _ ";"
    {
      return { kind: "MessageTransmitters", id: id, transmitters: transmitters || [] };
    }

EnvironmentVariable
  = "EV_" __ name:Identifier _ ":" _ varType:UInt _
    "[" _ minimum:Number _ "|" _ maximum:Number _ "]" _
    unit:String _ initialValue:Number _ id:UInt _ access:Identifier _
    accessNodes:NodeList? _ ";"
    {
      return {
        kind: "EnvironmentVariable",
        name: name,
        varType: varType,
        minimum: minimum,
        maximum: maximum,
        unit: unit,
        initialValue: initialValue,
        id: id,
        access: access,
        accessNodes: accessNodes || []
      };
    }

EnvironmentVariableData
  = "ENVVAR_DATA_" __ name:Identifier _ ":" _ size:UInt _ ";"
    {
      return { kind: "EnvironmentVariableData", name: name, size: size };
    }

Comment
  = "CM_" !IdentChar _ target:(t:ObjectRef _ { return t; })? comment:String _ ";"
    {
      return { kind: "Comment", target: target || { kind: "Database" }, text: comment };
    }

AttributeDefinition
  = "BA_DEF_" !IdentChar _ objectKind:(k:ObjectKeyword _ { return k; })? name:String _ type:AttributeType _ ";"
    {
      return {
        kind: "AttributeDefinition",
        objectKind: objectKind || "Database",
        name: name,
        type: type
      };
    }

AttributeType
  = valueType:("INT" / "HEX" / "FLOAT") __ minimum:Number __ maximum:Number
    {
      return { valueType: valueType, minimum: minimum, maximum: maximum };
    }
  / "STRING" !IdentChar { return { valueType: "STRING" }; }
  / "ENUM" !IdentChar _ values:StringList?
    {
      return { valueType: "ENUM", values: values || [] };
    }

AttributeDefault
  = "BA_DEF_DEF_" !IdentChar _ name:String _ value:Literal _ ";"
    {
      return { kind: "AttributeDefault", name: name, value: value };
    }

AttributeValue
  = "BA_" !IdentChar _ name:String _ target:(t:ObjectRef _ { return t; })? value:Literal _ ";"
    {
      return {
        kind: "AttributeValue",
        name: name,
        target: target || { kind: "Database" },
        value: value
      };
    }

ObjectKeyword
  = "BU_" !IdentChar { return "Node"; }
  / "BO_" !IdentChar { return "Message"; }
  / "SG_" !IdentChar { return "Signal"; }
  / "EV_" !IdentChar { return "EnvironmentVariable"; }

ObjectRef
  = "BU_" __ name:Identifier { return { kind: "Node", name: name }; }
  / "BO_" __ id:UInt { return { kind: "Message", id: id }; }
  / "SG_" __ id:UInt __ signal:Identifier { return { kind: "Signal", id: id, signal: signal }; }
  / "EV_" __ name:Identifier { return { kind: "EnvironmentVariable", name: name }; }

ValueDescription
  = "VAL_" !IdentChar _ target:ValueTarget entries:ValueEntries _ ";"
    {
      return { kind: "ValueDescription", target: target, entries: entries };
    }

ValueTarget
  = id:UInt __ signal:Identifier { return { kind: "Signal", id: id, signal: signal }; }
  / name:Identifier { return { kind: "EnvironmentVariable", name: name }; }

SignalValueType
  = "SIG_VALTYPE_" __ id:UInt __ signal:Identifier _ ":"? _ valueType:UInt _ ";"
    {
      return { kind: "SignalValueType", id: id, signal: signal, valueType: valueType };
    }

SignalMultiplexValues
  = "SG_MUL_VAL_" __ id:UInt __ signal:Identifier __ multiplexor:Identifier __ ranges:RangeList _ ";"
    {
      return {
        kind: "SignalMultiplexValues",
        id: id,
        signal: signal,
        multiplexor: multiplexor,
        ranges: ranges
      };
    }

RangeList
  = first:MuxRange rest:(_ "," _ r:MuxRange { return r; })* { return [first].concat(rest); }

MuxRange
  = lower:UInt _ "-" _ upper:UInt { return { lower: lower, upper: upper }; }

SignalGroup
  = "SIG_GROUP_" __ id:UInt __ name:Identifier __ repetitions:UInt _ ":" signals:(_ s:Identifier { return s; })* _ ";"
    {
      return {
        kind: "SignalGroup",
        id: id,
        name: name,
        repetitions: repetitions,
        signals: signals
      };
    }

Unknown
  = keyword:Identifier &{ return KNOWN.indexOf(keyword) < 0; } body:$(String / [^;"])* ";"
    {
      return { kind: "Unknown", keyword: keyword, text: body.trim() };
    }

NodeList
  = first:Identifier rest:(_ "," _ n:Identifier { return n; })* { return [first].concat(rest); }

StringList
  = first:String rest:(_ "," _ s:String { return s; })* { return [first].concat(rest); }

Literal
  = Number
  / String

Identifier
  = $([A-Za-z_] IdentChar*)

IdentChar
  = [A-Za-z0-9_]

UInt
  = digits:$[0-9]+ { return parseInt(digits, 10); }

Number
  = value:$([+-]? ([0-9]+ ("." [0-9]*)? / "." [0-9]+) ([eE] [+-]? [0-9]+)?)
    { return parseFloat(value); }

String
  = '"' chars:StringChar* '"' { return chars.join(""); }

StringChar
  = "\\\\" c:. { return c; }
  / [^"\\\\]

// Whitespace and comments
_
  = (WhiteSpace / LineComment)*

__
  = (WhiteSpace / LineComment)+

HS
  = [ \\t]

WhiteSpace
  = [ \\t\\n\\r]+

LineComment
  = "//" [^\\n]*
`;
