/**
 * Ping Feature
 */

import type { EmptyResult } from "../../protocol/types";

export async function handlePing(): Promise<EmptyResult> {
  return {};
}
