import type { DeclarationUnit, Member, Parameter } from '../model/declaration.js';
import { Roff, escapeLiteral, escapeText } from './roff.js';

/** Escape text for a `.B`/`.BI` argument written inside double quotes. */
function arg(text: string): string {
  return escapeText(text).replace(/"/g, '\\(dq');
}

type MacroLine = [name: 'B' | 'BI', argument: string];

function glue(type: string): string {
  return type.endsWith('*') || type.endsWith('(') ? '' : ' ';
}

/** `.BI` alternates bold and italic between quoted arguments; names go in italic slots. */
function italic(name: string): string {
  return `" ${arg(name)} "`;
}

function parameterList(parameters: readonly Parameter[]): string {
  return parameters
    .map(parameter => {
      let text = arg(parameter.type);
      if (parameter.name !== undefined || parameter.suffix) text += glue(parameter.type);
      if (parameter.name !== undefined) text += italic(parameter.name);
      return text + arg(parameter.suffix);
    })
    .join(', ');
}

function functionSignature(unit: DeclarationUnit): MacroLine {
  if (unit.details.kind !== 'function') return ['B', arg(unit.signature)];
  const { returnType, parameters, arity } = unit.details;
  const list = arity === 'void' ? 'void' : parameterList(parameters);
  return ['BI', `"${arg(returnType)}${glue(returnType)}${arg(unit.name)}(${list});"`];
}

function macroSignature(unit: DeclarationUnit): MacroLine {
  if (unit.details.kind !== 'macro') return ['B', arg(unit.signature)];
  const { parameters, initializer } = unit.details;
  if (parameters === undefined) {
    return ['B', arg(initializer === undefined ? `#define ${unit.name}` : `#define ${unit.name} ${initializer}`)];
  }
  if (parameters.length === 0) return ['B', `"#define ${arg(unit.name)}()"`];
  return ['BI', `"#define ${arg(unit.name)}(${parameters.map(italic).join(', ')})"`];
}

/** Identifiers of a function-pointer tail that name its parameters go italic. */
function typedefSignature(unit: DeclarationUnit, documented: ReadonlySet<string>): MacroLine {
  if (unit.details.kind !== 'typedef') return ['B', arg(unit.signature)];
  const { type, suffix, parameters } = unit.details;
  const names = new Set([
    ...documented,
    ...(parameters ?? []).flatMap(parameter => (parameter.name === undefined ? [] : [parameter.name])),
  ]);
  const tail = suffix
    .split(/([A-Za-z_]\w*)/)
    .map((token, index) => (index % 2 === 1 && names.has(token) ? italic(token) : arg(token)))
    .join('');
  return ['BI', `"typedef ${arg(type)}${glue(type)}${arg(unit.name)}${tail};"`];
}

function variableSignature(unit: DeclarationUnit): MacroLine {
  if (unit.details.kind !== 'variable') return ['B', arg(unit.signature)];
  const { type, suffix, storage } = unit.details;
  const qualifiers = storage.filter(word => word !== 'extern');
  const prefix = qualifiers.length > 0 ? `${qualifiers.join(' ')} ` : '';
  return ['B', `"${arg(prefix + type)}${glue(type)}${arg(unit.name)}${arg(suffix)};"`];
}

function memberLines(members: readonly Member[], roff: Roff): void {
  for (const member of members) {
    if (member.kind === 'constant') {
      roff.macro('B', `"${arg(member.signature)},"`);
    } else if (member.record) {
      roff.macro('B', `"${arg(member.signature)} {"`).macro('RS');
      memberLines(member.members, roff);
      roff.macro('RE').macro('B', `"}${member.name ? ' ' + arg(member.name) : ''};"`);
    } else {
      roff.macro('B', `"${arg(member.signature)};"`);
    }
  }
}

function recordBody(unit: DeclarationUnit, roff: Roff): void {
  if (unit.details.kind === 'record' && !unit.details.hasBody) {
    roff.macro('B', `"${arg(unit.signature)};"`);
    return;
  }
  roff.macro('B', `"${arg(unit.signature)} {"`).macro('RS');
  memberLines(unit.members, roff);
  roff.macro('RE').macro('B', '"};"');
}

/**
 * SYNOPSIS body: the `#include` line and the declaration in a no-fill block.
 * `documentedParams` lists `\param` names, which also go italic in typedefs.
 */
export function renderSynopsis(
  unit: DeclarationUnit,
  include: string,
  documentedParams: ReadonlySet<string> = new Set(),
): Roff {
  const roff = new Roff().macro('nf').macro('B', `#include <${arg(include)}>`);
  if (unit.kind === 'file') return roff.macro('fi');

  roff.macro('PP');
  switch (unit.kind) {
    case 'function':
      roff.macro(...functionSignature(unit));
      break;
    case 'macro':
      roff.macro(...macroSignature(unit));
      break;
    case 'typedef':
      roff.macro(...typedefSignature(unit, documentedParams));
      break;
    case 'variable':
      roff.macro(...variableSignature(unit));
      break;
    case 'struct':
    case 'union':
    case 'enum':
      recordBody(unit, roff);
      break;
    default:
      // Unrecognized text keeps its own line breaks.
      for (const line of unit.signature.split('\n')) {
        if (line.trim() !== '') roff.raw(escapeLiteral(line.trimEnd()));
      }
      break;
  }
  return roff.macro('fi');
}
