/**
 * Read the dataset files and build the graph in one step.
 */

import { dataFiles, type BookReviewsConfig } from "./config"
import { BookReviewsCsvParser } from "./csv"
import { BookReviewsGraph, type BuildReport } from "./graph"
import type { Logger } from "./logger"

export interface LoadedGraph {
  graph: BookReviewsGraph
  report: BuildReport
}

export async function loadBookReviewsGraph(config: BookReviewsConfig, logger: Logger): Promise<LoadedGraph> {
  const files = dataFiles(config)
  logger.debug("Reading dataset", { ...files })

  const parser = new BookReviewsCsvParser({ onInvalidRow: config.onInvalidRow, logger: logger.child("csv") })
  const records = await parser.parse(files)

  const graph = new BookReviewsGraph({ indexTitles: config.indexTitles, logger: logger.child("graph") })
  const report = graph.load(records)
  return { graph, report }
}
