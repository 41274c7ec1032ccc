/**
 * Conversion module exports
 *
 * Maps each conversion letter to its renderer.
 *
 * @module conversions
 */

import type {
	Conversion,
	ConversionContext,
	FormatValue,
	ResolvedSpec,
} from "../shared/types.js";
import { renderFloat } from "./float.js";
import { renderHexFloat } from "./hex-float.js";
import { renderInteger } from "./integer.js";
import { renderChar, renderString } from "./text.js";

/**
 * Signature shared by every conversion
 */
export type ConversionRenderer = (
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	context: ConversionContext,
) => string;

export const RENDERERS: Readonly<Record<Conversion, ConversionRenderer>> = {
	d: renderInteger,
	i: renderInteger,
	u: renderInteger,
	o: renderInteger,
	x: renderInteger,
	X: renderInteger,
	f: renderFloat,
	F: renderFloat,
	e: renderFloat,
	E: renderFloat,
	g: renderFloat,
	G: renderFloat,
	a: renderHexFloat,
	A: renderHexFloat,
	s: renderString,
	c: renderChar,
};

/**
 * Renders one value according to a resolved placeholder
 */
export function renderValue(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	context: ConversionContext,
): string {
	return RENDERERS[spec.conversion](value, spec, position, context);
}

export { renderInteger } from "./integer.js";
export { renderFloat, fixedDigits, exponentDigits, generalDigits } from "./float.js";
export { renderHexFloat, hexDigits } from "./hex-float.js";
export { renderString, renderChar, stringify } from "./text.js";
