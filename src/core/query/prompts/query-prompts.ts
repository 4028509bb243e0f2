/**
 * LLM Prompts for Query Translation
 *
 * @module
 */

/**
 * Used when the live schema cannot be read
 */
export const FALLBACK_SCHEMA_HINT = `(Schema could not be retrieved. Assume the base types:
- physical_object owning name, color, material, shape, size, position_description, scene_id
- spatial relations on, under, next_to, in_front_of, behind, inside, contains
- relation roles subject and reference)`;

// =============================================================================
// TypeQL Reference
// =============================================================================

const TYPEQL_REFERENCE = `# TYPEQL 3 QUICK REFERENCE

Variables start with $. Statements end with a semicolon. Comments start with #.

Pipeline stages, in order:
- match <pattern>;                 find data
- select $a, $b; sort $a desc; limit 10; offset 5;
- reduce $n = count groupby $x;    aggregates: count, sum, mean, max, min
- fetch { "key": $x.attr };        JSON output; [$x.attr] for many values, { $x.* } for all

Patterns:
- $x isa chair;                               type (subtypes included)
- $x has name $n;  $x has color "red";        attributes
- on (subject: $x, reference: $y);            anonymous relation
- $r isa on, links (subject: $x, reference: $y);
- $a > 3;  $n like "^mon";  $n contains "desk";
- { pattern } or { pattern };  not { pattern };  try { pattern };

Rules:
1. Bind every concept to a variable: "match $p isa person;", never "match isa person;".
2. Bind attributes in match to variables: "$p has name $n;".
3. Fetch attribute values, never entity or relation variables:
   fetch { "name": $p.name };  not  fetch { "person": $p };
4. Relations use TypeQL 3 syntax: "on (subject: $a, reference: $b);".
   "($role: $a) isa on" is TypeQL 2 and is rejected.

Example: what is on the desk?
match
  $desk isa desk;
  $item isa physical_object, has name $n;
  on (subject: $item, reference: $desk);
fetch { "item": $n };

Example: how many chairs are there?
match
  $c isa chair;
reduce $count = count;`;

// =============================================================================
// Translation Prompt
// =============================================================================

export function generateQueryTranslationPrompt(question: string, schema: string): string {
  return `You translate questions about a scene graph into TypeQL 3 read queries for TypeDB.

${TYPEQL_REFERENCE}

# CURRENT SCHEMA
${schema}

# QUESTION
${question}

Guidelines:
- Match the question's nouns to entity types and its spatial words to relation types in the
  schema ("what monitors" means "$x isa monitor", "on the desk" means the on relation).
- Filter by attribute values only when the question names one ("black monitors").
- Add sort, limit or reduce stages only when the question asks for them.

Reply with the TypeQL query only: no explanation, no markdown.`;
}
