/**
 * Definitions registry: id -> reusable artifact, one per parsed document
 */

import { deepFreeze } from '@svgdraw/core'
import type { Brush, DrawingNode, Transform } from '@svgdraw/core'

interface ArtifactValues {
	brush: Brush
	drawing: DrawingNode
	transform: Transform
	scalar: number
	dashArray: readonly number[]
}

export type ArtifactKind = keyof ArtifactValues

export type Artifact = { [K in ArtifactKind]: { readonly kind: K; readonly value: ArtifactValues[K] } }[ArtifactKind]

export type ArtifactValue<K extends ArtifactKind> = ArtifactValues[K]

const ARTIFACT_KINDS: readonly ArtifactKind[] = ['brush', 'drawing', 'transform', 'scalar', 'dashArray']

type Stores = { readonly [K in ArtifactKind]: Map<string, ArtifactValues[K]> }

export class DefinitionsRegistry {
	private readonly stores: Stores = {
		brush: new Map(),
		drawing: new Map(),
		transform: new Map(),
		scalar: new Map(),
		dashArray: new Map(),
	}

	/** Store an artifact under an id. The last write wins, whatever its kind. */
	register(id: string, artifact: Artifact): void {
		this.delete(id)
		switch (artifact.kind) {
			case 'brush':
				this.stores.brush.set(id, deepFreeze(artifact.value))
				break
			case 'drawing':
				this.stores.drawing.set(id, deepFreeze(artifact.value))
				break
			case 'transform':
				this.stores.transform.set(id, deepFreeze(artifact.value))
				break
			case 'scalar':
				this.stores.scalar.set(id, artifact.value)
				break
			case 'dashArray':
				this.stores.dashArray.set(id, deepFreeze(artifact.value))
				break
		}
	}

	/** The artifact under `id` if it is of the requested kind */
	get<K extends ArtifactKind>(id: string, kind: K): ArtifactValue<K> | undefined {
		const store: Map<string, ArtifactValues[K]> = this.stores[kind]
		return store.get(id)
	}

	has(id: string): boolean {
		return this.kindOf(id) !== undefined
	}

	kindOf(id: string): ArtifactKind | undefined {
		for (const kind of ARTIFACT_KINDS) {
			if (this.stores[kind].has(id)) return kind
		}
		return undefined
	}

	delete(id: string): boolean {
		let removed = false
		for (const kind of ARTIFACT_KINDS) {
			if (this.stores[kind].delete(id)) removed = true
		}
		return removed
	}

	get size(): number {
		return ARTIFACT_KINDS.reduce((total, kind) => total + this.stores[kind].size, 0)
	}
}
