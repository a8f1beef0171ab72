import type { Deviation, MapNode, Point } from './types.ts'
import { DEFAULT_NODE_STYLE, genId } from './types.ts'

// ── Saved analysis shape ────────────────────────────────────

export interface ProjectDeviationJSON {
  deviation: string
  causes: string[]
  consequence: string
  safeguards: string[]
  recommendations: string[]
  comments: string
  minimized: boolean
}

export interface ProjectNodeJSON {
  name: string
  color: string
  thickness: number
  transparency: number
  has_arrow: boolean
  font_size: number
  points: [number, number][]
  deviations: ProjectDeviationJSON[]
  page_number: number
}

export interface ProjectJSON {
  pdf_path: string
  nodes: ProjectNodeJSON[]
}

export interface Project {
  documentPath: string | null
  nodes: MapNode[]
}

// ── Serialize ───────────────────────────────────────────────

export function toProjectJSON(project: Project): ProjectJSON {
  return {
    pdf_path: project.documentPath ?? '',
    nodes: project.nodes.map((n) => ({
      name: n.name,
      color: n.color,
      thickness: n.strokeWidth,
      transparency: n.opacity,
      has_arrow: n.hasArrow,
      font_size: n.fontSize,
      points: n.points.map((p): [number, number] => [p.x, p.y]),
      deviations: n.deviations.map((d) => ({
        deviation: d.deviation,
        causes: [...d.causes],
        consequence: d.consequence,
        safeguards: [...d.safeguards],
        recommendations: [...d.recommendations],
        comments: d.comments,
        minimized: d.minimized,
      })),
      page_number: n.page,
    })),
  }
}

export function serializeProject(project: Project): string {
  return JSON.stringify(toProjectJSON(project), null, 2)
}

// ── Parse ───────────────────────────────────────────────────

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function fail(detail: string): never {
  throw new Error(`Invalid project JSON: ${detail}`)
}

function num(obj: Record<string, unknown>, key: string, fallback: number, where: string): number {
  const v = obj[key]
  if (v === undefined) return fallback
  if (typeof v !== 'number' || !Number.isFinite(v)) fail(`${where}.${key} must be a number`)
  return v
}

function pageIndex(obj: Record<string, unknown>, where: string): number {
  const v = num(obj, 'page_number', 0, where)
  if (!Number.isInteger(v) || v < 0) fail(`${where}.page_number must be a page index`)
  return v
}

function str(obj: Record<string, unknown>, key: string, fallback: string, where: string): string {
  const v = obj[key]
  if (v === undefined) return fallback
  if (typeof v !== 'string') fail(`${where}.${key} must be a string`)
  return v
}

function bool(obj: Record<string, unknown>, key: string, fallback: boolean, where: string): boolean {
  const v = obj[key]
  if (v === undefined) return fallback
  if (typeof v !== 'boolean') fail(`${where}.${key} must be a boolean`)
  return v
}

function strList(obj: Record<string, unknown>, key: string, where: string): string[] {
  const v = obj[key]
  if (v === undefined) return []
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === 'string')) {
    fail(`${where}.${key} must be a list of strings`)
  }
  return v
}

function parsePoint(v: unknown, where: string): Point {
  if (!Array.isArray(v) || v.length !== 2) fail(`${where} must be an [x, y] pair`)
  const [x, y] = v
  if (typeof x !== 'number' || typeof y !== 'number') fail(`${where} must hold numbers`)
  return { x, y }
}

function parseDeviation(v: unknown, where: string): Deviation {
  if (!isRecord(v)) fail(`${where} must be an object`)
  return {
    id: genId(),
    deviation: str(v, 'deviation', '', where),
    causes: strList(v, 'causes', where),
    consequence: str(v, 'consequence', '', where),
    safeguards: strList(v, 'safeguards', where),
    recommendations: strList(v, 'recommendations', where),
    comments: str(v, 'comments', '', where),
    minimized: bool(v, 'minimized', false, where),
  }
}

function parseNode(v: unknown, where: string): MapNode {
  if (!isRecord(v)) fail(`${where} must be an object`)
  const points = v.points ?? []
  const deviations = v.deviations ?? []
  if (!Array.isArray(points)) fail(`${where}.points must be a list`)
  if (!Array.isArray(deviations)) fail(`${where}.deviations must be a list`)

  return {
    id: genId(),
    name: str(v, 'name', '', where),
    color: str(v, 'color', DEFAULT_NODE_STYLE.color, where),
    strokeWidth: num(v, 'thickness', DEFAULT_NODE_STYLE.strokeWidth, where),
    opacity: num(v, 'transparency', DEFAULT_NODE_STYLE.opacity, where),
    hasArrow: bool(v, 'has_arrow', DEFAULT_NODE_STYLE.hasArrow, where),
    fontSize: num(v, 'font_size', DEFAULT_NODE_STYLE.fontSize, where),
    points: points.map((p, i) => parsePoint(p, `${where}.points[${i}]`)),
    deviations: deviations.map((d, i) => parseDeviation(d, `${where}.deviations[${i}]`)),
    page: pageIndex(v, where),
  }
}

/** Reads a saved analysis; node and deviation ids are freshly assigned. */
export function parseProject(json: string): Project {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    throw new Error('Invalid JSON: failed to parse')
  }

  if (!isRecord(parsed)) fail('expected an object')
  const nodes = parsed.nodes ?? []
  if (!Array.isArray(nodes)) fail('expected { pdf_path, nodes: [] }')

  const path = str(parsed, 'pdf_path', '', 'project')
  return {
    documentPath: path === '' ? null : path,
    nodes: nodes.map((n, i) => parseNode(n, `nodes[${i}]`)),
  }
}
