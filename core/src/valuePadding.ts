/**
 * msb-drop value padding.
 *
 * Colored amounts travel in an output's ledger value shifted left by one bit.
 * When the shifted amount would fall below the minimum output value, the low
 * bit is set and a single padding bit is added above the minimum's most
 * significant bit. Removing the padding drops that top bit again.
 */

import { MINIMUM_PADDED_VALUE } from './constants.js'
import { assertContract } from './errors.js'

const bitLength = (value: number): number => value === 0 ? 0 : value.toString(2).length

export function addMsbdropValuePadding(amount: number, minimumValue: number): number {
  assertContract(Number.isSafeInteger(amount) && amount >= 0, `Invalid unpadded amount: ${amount}`)
  assertContract(Number.isSafeInteger(minimumValue) && minimumValue >= 0, `Invalid minimum value: ${minimumValue}`)

  let value = amount * 2
  if (value < minimumValue) {
    value = value + 2 ** bitLength(minimumValue) + 1
  }
  return value
}

export function removeMsbdropValuePadding(value: number): number {
  assertContract(Number.isSafeInteger(value) && value >= 0, `Invalid padded value: ${value}`)

  if (value % 2 === 1) {
    value = value - 2 ** (bitLength(value) - 1)
  }
  return Math.floor(value / 2)
}

/** Ledger value of an output carrying `amount` units of an asset */
export function makeAssetValue(amount: number): number {
  return addMsbdropValuePadding(amount, MINIMUM_PADDED_VALUE)
}
