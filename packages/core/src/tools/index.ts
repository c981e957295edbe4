import { ArrowTool } from "./arrow.js";
import { DiamondTool } from "./diamond.js";
import { EraserTool } from "./eraser.js";
import { FreehandTool } from "./freehand.js";
import { LineTool } from "./line.js";
import { RectangleTool } from "./rectangle.js";
import { SelectTool } from "./select.js";
import { TextTool } from "./text.js";
import type { Tool, ToolId } from "./tool.js";

/** Per-tool settings. Rectangles read their border style from the ToolContext instead. */
export interface ToolOptions {
  freehandChar?: string;
  eraserSize?: number;
}

export function createTool(id: ToolId, options: ToolOptions = {}): Tool {
  switch (id) {
    case "rectangle":
      return new RectangleTool();
    case "line":
      return new LineTool();
    case "arrow":
      return new ArrowTool();
    case "diamond":
      return new DiamondTool();
    case "text":
      return new TextTool();
    case "freehand":
      return new FreehandTool(options.freehandChar);
    case "select":
      return new SelectTool();
    case "eraser":
      return new EraserTool(options.eraserSize);
  }
}

export { ArrowTool, arrowBodyChar, arrowhead, drawArrow } from "./arrow.js";
export { DiamondTool, drawDiamond } from "./diamond.js";
export { DragTool } from "./drag-tool.js";
export { EraserTool, erasePatch } from "./eraser.js";
export { FreehandTool } from "./freehand.js";
export { LineTool, drawLine, lineChar } from "./line.js";
export { RectangleTool, drawRectangle } from "./rectangle.js";
export { SelectTool } from "./select.js";
export type { SelectionMove } from "./select.js";
export { StrokeTool } from "./stroke-tool.js";
export { TextTool } from "./text.js";
export {
  DEFAULT_TOOL,
  TOOLS,
  emptyResult,
  finishedResult,
  parseToolId,
  previewResult,
  toolFromShortcut,
  toolInfo,
} from "./tool.js";
export type { PreviewMode, Tool, ToolContext, ToolId, ToolInfo, ToolResult } from "./tool.js";
