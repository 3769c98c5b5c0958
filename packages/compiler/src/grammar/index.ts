import * as ohm from 'ohm-js'

/**
 * Faultline taxonomy grammar.
 *
 * A taxonomy is a named, braced list of nodes. A node starting with an
 * identifier is a leaf (an error variant, optionally followed by its fields);
 * a node starting with a brace is a group of nodes. Attributes such as
 * `#[kind = "Error"]` or `#[nested]` precede any node, and `#[span]` may
 * precede one field of a leaf.
 *
 * ```
 * #[kind = "Error"]
 * FileSystemError {
 *     #[number = "0", msg = "file errors"]
 *     {
 *         #[number = "1", msg = "File {path:?} not found."]
 *         FileNotFound { path: string, #[span] at: Span },
 *     },
 * }
 * ```
 *
 * Comments (`// ...` and `/* ... *\/`) are treated as whitespace. Field types
 * are captured verbatim, with balanced `<>`, `()` and `[]`; `->` and `=>`
 * are arrows, not closing brackets.
 */
const grammarSource = String.raw`
Faultline {
  Taxonomy = Attribute* ident generics? "{" Nodes "}"
  Nodes = ListOf<Node, ","> ","?
  Node = Attribute* NodeBody
  NodeBody = Leaf | Group
  Group = "{" Nodes "}"
  Leaf = ident Fields?

  Fields = "{" ListOf<NamedField, ","> ","? "}"  -- named
         | "(" ListOf<PositionalField, ","> ","? ")"  -- positional
  NamedField = Attribute* ident ":" fieldType
  PositionalField = Attribute* fieldType

  Attribute = "#" "[" ListOf<AttributeEntry, ","> "]"
  AttributeEntry = ident "=" literal  -- pair
                 | ident  -- flag

  // Literals
  literal = stringLiteral | integerLiteral
  stringLiteral = "\"" stringChar* "\""
  stringChar = "\\" any  -- escaped
             | ~("\"" | "\\") any  -- plain
  integerLiteral = digit+

  // Identifiers
  ident (an identifier) = identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"

  // Opaque type text
  generics (a generic parameter list) = "<" genericsPart* ">"
  genericsPart = generics | ~("<" | ">") any
  fieldType (a field type) = typePart+
  typePart = ("->" | "=>")  -- arrow
           | "<" typeInner* ">"  -- angle
           | "(" typeInner* ")"  -- paren
           | "[" typeInner* "]"  -- bracket
           | ~typeStop any  -- char
  typeInner = typePart | "," | "\n" | "\r"
  typeStop = "," | "<" | ">" | "(" | ")" | "[" | "]" | "{" | "}" | "#" | "\n" | "\r" | "//"

  // Comments treated as whitespace
  space += comment
  comment = "//" (~("\n" | "\r") any)*  -- line
          | "/*" (~"*/" any)* "*/"  -- block
}
`

/**
 * The compiled Faultline grammar. Built once at module load and shared.
 */
export const FaultlineGrammar = ohm.grammar(grammarSource)
