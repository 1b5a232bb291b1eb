/**
 * Business Rule Store
 *
 * Domain knowledge keyed by (scope, kind, key). A later write with the same
 * key overwrites the earlier value; no history is kept.
 *
 * Input document sections:
 *   general_terms:  { key: text }
 *   metrics:        { key: sql fragment }
 *   calculations:   { key: sql fragment }
 *   table_terms:    { table: { key: text } }
 *   enum_values:    { table: { column: gloss } }
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ConfigError } from "./errors.js"
import { GENERAL_SCOPE, type BusinessRule, type RuleKind } from "./schema_types.js"

// ============================================================================
// Store
// ============================================================================

function ruleId(scope: string, kind: RuleKind, key: string): string {
	return `${scope}\u0000${kind}\u0000${key}`
}

export class BusinessRuleStore {
	private rules = new Map<string, BusinessRule>()

	constructor(initial: BusinessRule[] = []) {
		for (const rule of initial) this.set(rule)
	}

	set(rule: BusinessRule): void {
		const key = rule.key.trim()
		if (!key) throw new ConfigError("Business rule key must not be empty", { scope: rule.scope, kind: rule.kind })
		this.rules.set(ruleId(rule.scope, rule.kind, key), { ...rule, key })
	}

	get(scope: string, kind: RuleKind, key: string): BusinessRule | undefined {
		return this.rules.get(ruleId(scope, kind, key))
	}

	remove(scope: string, kind: RuleKind, key: string): boolean {
		return this.rules.delete(ruleId(scope, kind, key))
	}

	/** Rules scoped to one table */
	forTable(tableName: string): BusinessRule[] {
		return this.all().filter((r) => r.scope === tableName)
	}

	general(): BusinessRule[] {
		return this.all().filter((r) => r.scope === GENERAL_SCOPE)
	}

	/** All rules, sorted for deterministic rendering */
	all(): BusinessRule[] {
		return [...this.rules.values()].sort(compareRules)
	}

	get size(): number {
		return this.rules.size
	}

	/** Rules whose key appears verbatim in the text (exact-key matching). */
	matching(text: string): BusinessRule[] {
		const lowered = text.toLowerCase()
		return this.all().filter((r) => lowered.includes(r.key.toLowerCase()))
	}

	/** Distinct keys across all scopes, longest first */
	keys(): string[] {
		const keys = new Set(this.all().map((r) => r.key))
		return [...keys].sort((a, b) => b.length - a.length || a.localeCompare(b))
	}

	clone(): BusinessRuleStore {
		return new BusinessRuleStore(this.all())
	}
}

const KIND_ORDER: Record<RuleKind, number> = { term: 0, metric: 1, calculation: 2, enum_value: 3 }

function compareRules(a: BusinessRule, b: BusinessRule): number {
	if (a.scope !== b.scope) {
		if (a.scope === GENERAL_SCOPE) return -1
		if (b.scope === GENERAL_SCOPE) return 1
		return a.scope < b.scope ? -1 : 1
	}
	if (a.kind !== b.kind) return KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
	return a.key < b.key ? -1 : a.key > b.key ? 1 : 0
}

// ============================================================================
// Document Parsing
// ============================================================================

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v))
const flatSection = z.record(scalar).default({})
const nestedSection = z.record(z.record(scalar)).default({})

export const businessRulesDocumentSchema = z.object({
	general_terms: flatSection,
	metrics: flatSection,
	calculations: flatSection,
	table_terms: nestedSection,
	enum_values: nestedSection,
})

export type BusinessRulesDocument = z.input<typeof businessRulesDocumentSchema>

export function parseBusinessRulesDocument(doc: unknown): BusinessRuleStore {
	const result = businessRulesDocumentSchema.safeParse(doc ?? {})
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new ConfigError(`Invalid business rules at ${issue.path.join(".") || "(root)"}: ${issue.message}`)
	}
	const parsed = result.data
	const store = new BusinessRuleStore()

	for (const [key, value] of Object.entries(parsed.general_terms)) {
		store.set({ scope: GENERAL_SCOPE, kind: "term", key, value })
	}
	for (const [key, value] of Object.entries(parsed.metrics)) {
		store.set({ scope: GENERAL_SCOPE, kind: "metric", key, value })
	}
	for (const [key, value] of Object.entries(parsed.calculations)) {
		store.set({ scope: GENERAL_SCOPE, kind: "calculation", key, value })
	}
	for (const [table, terms] of Object.entries(parsed.table_terms)) {
		for (const [key, value] of Object.entries(terms)) {
			store.set({ scope: table, kind: "term", key, value })
		}
	}
	for (const [table, columns] of Object.entries(parsed.enum_values)) {
		for (const [column, gloss] of Object.entries(columns)) {
			store.set({ scope: table, kind: "enum_value", key: column, value: gloss })
		}
	}
	return store
}

/** Load a YAML or JSON business rules file. */
export function loadBusinessRules(filePath: string): BusinessRuleStore {
	const resolved = path.resolve(filePath)
	if (!fs.existsSync(resolved)) {
		throw new ConfigError(`Business rules file not found: ${resolved}`, { file: resolved })
	}
	const raw = fs.readFileSync(resolved, "utf-8")
	let doc: unknown
	try {
		doc = resolved.endsWith(".json") ? JSON.parse(raw) : yaml.load(raw)
	} catch (err) {
		throw new ConfigError(`Cannot parse business rules file ${resolved}: ${String(err)}`, { file: resolved })
	}
	return parseBusinessRulesDocument(doc)
}
