// src/output_writer/index.ts

import * as path from "path";
import { ARTIFACT_FILES } from "../config";
import { atomicWriteFileSync, FsyncMode } from "./atomic_write";

export { atomicWriteFileSync };
export type { FsyncMode };

export interface PipelineArtifacts {
    graphJson: string;
    diagram: string;
    buildScript: string;
}

export interface WrittenArtifacts {
    graphPath: string;
    diagramPath: string;
    buildScriptPath: string;
    warnings: string[];
}

export function writeArtifacts(outDir: string, artifacts: PipelineArtifacts, fsyncMode: FsyncMode = "BEST_EFFORT"): WrittenArtifacts {
    const warnings: string[] = [];
    const graphPath = path.join(outDir, ARTIFACT_FILES.GRAPH);
    const diagramPath = path.join(outDir, ARTIFACT_FILES.DIAGRAM);
    const buildScriptPath = path.join(outDir, ARTIFACT_FILES.BUILD_SCRIPT);

    atomicWriteFileSync({ filePath: graphPath, content: artifacts.graphJson, mode: 0o644, fsyncMode, warnings });
    atomicWriteFileSync({ filePath: diagramPath, content: artifacts.diagram + "\n", mode: 0o644, fsyncMode, warnings });
    atomicWriteFileSync({ filePath: buildScriptPath, content: artifacts.buildScript + "\n", mode: 0o644, fsyncMode, warnings });

    return { graphPath, diagramPath, buildScriptPath, warnings };
}
