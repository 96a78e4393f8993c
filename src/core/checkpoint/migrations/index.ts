/**
 * Checkpoint Migration Registry
 *
 * @module
 */

import type { Migration } from "../../storage/migration-runner.js";
import { migration as migration001 } from "./001_checkpoint_schema.js";

export const CHECKPOINT_SCHEMA = "checkpoints";

export const checkpointMigrations: Migration[] = [migration001];
