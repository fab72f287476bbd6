export type { Ingredient, QuantityValue, Token } from '@domain/models/Ingredient.ts'
export { createIngredient } from '@domain/models/Ingredient.ts'
export {
  IngredientParser,
  ingredientParser,
  parseIngredientLines,
  parseIngredientResults,
  parseIngredients,
} from '@application/parser/IngredientParser.ts'
export type { IngredientResult, LineParseResult, ParseOptions } from '@application/parser/IngredientParser.ts'
export {
  QUANTITY_STRATEGIES,
  QuantityClassifier,
  classifyQuantity,
  defaultClassifier,
  parseLiteralNumber,
  parseQuantityExpression,
} from '@application/parser/classifyQuantity.ts'
export type { QuantityStrategy } from '@application/parser/classifyQuantity.ts'
export type { MergedToken, QuantityTest } from '@application/parser/mergeQuantities.ts'
export type { FoldedTokens } from '@application/parser/parseParenthetical.ts'
export { decodeNumeralGlyph } from '@application/parser/decodeNumeralGlyph.ts'
export { evaluateQuantityExpression } from '@application/parser/quantityExpression.ts'
export { foldAsides, foldParentheticals } from '@application/parser/parseParenthetical.ts'
export { coalesceQuantities, formatMixedNumber, mergeQuantities } from '@application/parser/mergeQuantities.ts'
export { assembleIngredient, segmentTokens, tokenize } from '@application/parser/segmentIngredients.ts'
export { buildReport, formatIngredient, formatReportLine, selectLines } from '@application/parser/formatIngredient.ts'
export { MalformedExpressionError, MalformedIngredientError } from '@application/parser/errors.ts'
