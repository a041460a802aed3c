/**
 * Color space conversion
 */

/**
 * Convert HSL to RGB
 * h in degrees, s and l in percent
 */
export function hslToRgb(h: number, s: number, l: number): { r: number; g: number; b: number } {
	const hn = (((h % 360) + 360) % 360) / 360
	const sn = Math.min(100, Math.max(0, s)) / 100
	const ln = Math.min(100, Math.max(0, l)) / 100

	if (sn === 0) {
		const gray = Math.round(ln * 255)
		return { r: gray, g: gray, b: gray }
	}

	const hue2rgb = (p: number, q: number, t: number): number => {
		let tn = t
		if (tn < 0) tn += 1
		if (tn > 1) tn -= 1
		if (tn < 1 / 6) return p + (q - p) * 6 * tn
		if (tn < 1 / 2) return q
		if (tn < 2 / 3) return p + (q - p) * (2 / 3 - tn) * 6
		return p
	}

	const q = ln < 0.5 ? ln * (1 + sn) : ln + sn - ln * sn
	const p = 2 * ln - q

	return {
		r: Math.round(hue2rgb(p, q, hn + 1 / 3) * 255),
		g: Math.round(hue2rgb(p, q, hn) * 255),
		b: Math.round(hue2rgb(p, q, hn - 1 / 3) * 255),
	}
}
