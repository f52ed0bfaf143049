import type {
  Catalog,
  ProvisionOutcome,
  ProvisionRequest,
  ProvisionState,
} from "../types/index.js";
import { findCustomizer, resolveCustomizerName, runCustomizer } from "./customizer.js";
import { CloneError } from "./errors.js";
import { cloneRepo } from "./git.js";
import type { Log } from "./log.js";
import { resolveSource } from "./source.js";

export interface ProvisionDeps {
  log: Log;
  catalog: Catalog;
  clone?: (url: string, directory: string) => Promise<void>;
  runCustomizer?: (path: string, directory: string) => Promise<void>;
  onStateChange?: (state: ProvisionState) => void;
}

/**
 * Clone a project and run its customizer
 *
 * resolving-source → cloning → checking-customizer → running-customizer → done
 *
 * A missing customizer skips straight to done after a warning. Any thrown
 * error moves to failed and propagates unchanged (clone errors are wrapped in
 * CloneError first).
 */
export async function provisionProject(
  request: ProvisionRequest,
  deps: ProvisionDeps
): Promise<ProvisionOutcome> {
  const { log, catalog } = deps;
  const clone = deps.clone ?? cloneRepo;
  const execute = deps.runCustomizer ?? runCustomizer;
  const enter = (state: ProvisionState) => deps.onStateChange?.(state);

  try {
    enter("resolving-source");
    const source = resolveSource(request.sourceText, catalog);
    const customizerName = resolveCustomizerName(
      request.customizerOverride,
      source.customizerCandidate
    );

    enter("cloning");
    log.output(`Cloning '${source.cloneUrl}' into '${request.targetDirectory}'`);
    try {
      await clone(source.cloneUrl, request.targetDirectory);
    } catch (error) {
      throw new CloneError(source.cloneUrl, error);
    }

    enter("checking-customizer");
    const customizer = findCustomizer(request.targetDirectory, customizerName);
    if (!customizer.exists) {
      log.warning(`Customization file '${customizer.path}' not found`);
      enter("done");
      return {
        cloneUrl: source.cloneUrl,
        directory: request.targetDirectory,
        customizerPath: customizer.path,
        customizerRan: false,
      };
    }

    enter("running-customizer");
    log.output(`Running the customization script '${customizer.path}'`);
    await execute(customizer.path, request.targetDirectory);

    enter("done");
    return {
      cloneUrl: source.cloneUrl,
      directory: request.targetDirectory,
      customizerPath: customizer.path,
      customizerRan: true,
    };
  } catch (error) {
    enter("failed");
    throw error;
  }
}
