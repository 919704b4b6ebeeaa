/**
 * PEG grammar for the schema notation.
 * Compiled by peggy at runtime.
 */
export const SCHEMA_GRAMMAR = `
{
  // Left-associative fold of (ws op ws operand) tails
  function fold(head, tail) {
    return tail.reduce(function(left, t) {
      return { op: t[1], left: left, right: t[3] };
    }, head);
  }

  function list(head, tail) {
    return [head].concat(tail.map(function(t) { return t[3]; }));
  }

  function orUndefined(value) {
    return value === null ? undefined : value;
  }
}

Module
  = _ definitions:(d:Definition _ { return d; })*
    {
      return { definitions: definitions };
    }

Definition
  = name:Name _ "=" _ type:Type (_ ";")?
    {
      return { name: name, type: type, line: location().start.line };
    }

Type
  = IfType
  / SwitchType
  / StructType
  / ConstType
  / FormType
  / PrimitiveType
  / ReferenceType

IfType
  = "if" _ "(" _ condition:Expr _ ")" _ thenType:Type elseType:(_ "else" !NameChar _ t:Type { return t; })?
    {
      return { kind: "if", condition: condition, then: thenType, else: orUndefined(elseType) };
    }

SwitchType
  = keyword:("embedswitch" / "switch") _ "(" _ selector:Expr _ ")" _ "{" _ entries:CaseList? _ "}"
    {
      var result = { kind: "switch", selector: selector, cases: [], embedded: keyword === "embedswitch" };
      (entries || []).forEach(function(c) {
        if (c.key === null) {
          result.fallback = c.type;
        } else {
          result.cases.push(c);
        }
      });
      return result;
    }

CaseList
  = head:Case tail:(_ "," _ Case)* (_ ",")? { return list(head, tail); }

Case
  = key:CaseKey _ ":" _ type:Type { return { key: key, type: type }; }

CaseKey
  = "default" !NameChar { return null; }
  / Integer
  / QuotedString
  / Name

StructType
  = "{" _ fields:FieldList? _ "}"
    {
      return { kind: "struct", fields: fields || [] };
    }

FieldList
  = head:Field tail:(_ ("," / ";")? _ Field)* (_ ("," / ";"))? { return list(head, tail); }

Field
  = "embed" !NameChar _ type:Type
    {
      return { embedded: true, type: type };
    }
  / name:Name _ optional:"?"? _ ":" _ type:Type defaultValue:(_ "=" _ v:Literal { return v; })?
    {
      return {
        name: name,
        optional: optional !== null,
        type: type,
        defaultValue: orUndefined(defaultValue)
      };
    }

ConstType
  = "const" _ "[" _ values:IntegerList? _ "]"
    {
      return { kind: "constBytes", value: values || [] };
    }
  / "const" _ "(" _ value:Integer _ "," _ type:Type _ ")"
    {
      return { kind: "const", value: value, type: type };
    }

IntegerList
  = head:Integer tail:(_ "," _ Integer)* { return list(head, tail); }

FormType
  = "bytes" _ "(" _ length:Expr _ ")"
    { return { kind: "bytes", length: length }; }
  / "string" _ "(" _ length:Expr encoding:EncodingArg? _ ")"
    { return { kind: "string", length: length, encoding: orUndefined(encoding) }; }
  / "pascalstring" _ "(" _ lengthField:Type encoding:EncodingArg? _ ")"
    { return { kind: "pascalstring", lengthField: lengthField, encoding: orUndefined(encoding) }; }
  / "cstring" _ "(" _ encoding:QuotedString _ ")"
    { return { kind: "cstring", encoding: encoding }; }
  / "greedystring" _ "(" _ encoding:QuotedString _ ")"
    { return { kind: "greedystring", encoding: encoding }; }
  / "array" _ "(" _ count:Expr _ "," _ item:Type _ ")"
    { return { kind: "array", count: count, item: item }; }
  / "greedy" _ "(" _ item:Type _ ")"
    { return { kind: "greedy", item: item }; }
  / "prefixedArray" _ "(" _ countField:Type _ "," _ item:Type _ ")"
    { return { kind: "prefixedArray", countField: countField, item: item }; }
  / "prefixed" _ "(" _ lengthField:Type _ "," _ inner:Type _ ")"
    { return { kind: "prefixed", lengthField: lengthField, inner: inner }; }
  / "enum" _ "(" _ inner:Type _ ")" _ "{" _ members:MemberList? _ "}"
    { return { kind: "enum", inner: inner, members: members || [] }; }
  / "padding" _ "(" _ length:Expr _ ")"
    { return { kind: "padding", length: length }; }
  / "computed" _ "(" _ value:Expr _ ")"
    { return { kind: "computed", value: value }; }
  / "rebuild" _ "(" _ inner:Type _ "," _ value:Expr _ ")"
    { return { kind: "rebuild", inner: inner, value: value }; }

EncodingArg
  = _ "," _ encoding:QuotedString { return encoding; }

MemberList
  = head:Member tail:(_ "," _ Member)* (_ ",")? { return list(head, tail); }

Member
  = name:Name _ "=" _ value:Integer { return { name: name, value: value }; }

PrimitiveType
  = sign:[us] "8" !NameChar
    { return { kind: "int", size: 1, signed: sign === "s", endian: "big" }; }
  / sign:[us] bits:("16" / "32" / "64") order:("be" / "le") !NameChar
    { return { kind: "int", size: parseInt(bits, 10) / 8, signed: sign === "s", endian: order === "le" ? "little" : "big" }; }
  / "f" bits:("32" / "64") order:("be" / "le") !NameChar
    { return { kind: "float", size: parseInt(bits, 10) / 8, endian: order === "le" ? "little" : "big" }; }
  / name:("varint" / "flag" / "pass" / "terminated" / "greedybytes" / "greedystring" / "cstring") !NameChar
    { return { kind: name }; }

ReferenceType
  = name:Name { return { kind: "ref", name: name, line: location().start.line }; }

// Expressions, lowest precedence first

Expr
  = OrExpr

OrExpr
  = head:AndExpr tail:(_ "||" _ AndExpr)* { return fold(head, tail); }

AndExpr
  = head:EqExpr tail:(_ "&&" _ EqExpr)* { return fold(head, tail); }

EqExpr
  = head:RelExpr tail:(_ ("==" / "!=") _ RelExpr)* { return fold(head, tail); }

RelExpr
  = head:AddExpr tail:(_ ("<=" / ">=" / "<" / ">") _ AddExpr)* { return fold(head, tail); }

AddExpr
  = head:MulExpr tail:(_ ("+" / "-") _ MulExpr)* { return fold(head, tail); }

MulExpr
  = head:UnaryExpr tail:(_ ("*" / "/" / "%") _ UnaryExpr)* { return fold(head, tail); }

UnaryExpr
  = "!" _ operand:UnaryExpr { return { not: operand }; }
  / Primary

Primary
  = Integer
  / "true" !NameChar { return true; }
  / "false" !NameChar { return false; }
  / s:QuotedString { return { lit: s }; }
  / "len" _ "(" _ e:Expr _ ")" { return { len: e }; }
  / "(" _ e:Expr _ ")" { return e; }
  / $(Name ("." Name)*)

Literal
  = Integer
  / "true" !NameChar { return true; }
  / "false" !NameChar { return false; }
  / QuotedString

Integer
  = "0x" digits:$[0-9a-fA-F]+ { return parseInt(digits, 16); }
  / $("-"? [0-9]+) { return parseInt(text(), 10); }

Name
  = $([A-Za-z_] NameChar*)

NameChar
  = [A-Za-z0-9_]

QuotedString
  = '"' chars:$[^"]* '"' { return chars; }

// Whitespace and comments
_
  = (WhiteSpace / Comment)*

WhiteSpace
  = [ \\t\\n\\r]+

Comment
  = "#" [^\\n]*
  / "//" [^\\n]*
`;
