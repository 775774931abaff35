/**
 * The assistant's built-in tool set.
 */

import type { LanguageModel, ToolDescriptor } from "../types.js";
import { createCalculatorTool } from "./calculator.js";
import { createClipboardTools } from "./clipboard.js";
import { createReadFileTool } from "./files.js";
import { createLocationTool } from "./location.js";
import { createScreenVisionTool, type WindowControl } from "./screen-vision.js";
import { createShellTool } from "./shell.js";
import { createTimeTool } from "./time.js";
import { createWeatherTool } from "./weather.js";
import { createWebSearchTool } from "./web-search.js";

export interface DefaultToolsConfig {
  model: LanguageModel;
  openWeatherMapApiKey: string | undefined;
  /** Root directory read_file is confined to; also the shell's working directory */
  fileRoot: string;
  window?: WindowControl;
}

export function createDefaultTools(config: DefaultToolsConfig): ToolDescriptor[] {
  return [
    createWebSearchTool(),
    createTimeTool(),
    createCalculatorTool(),
    createWeatherTool({ apiKey: config.openWeatherMapApiKey }),
    createLocationTool(),
    createReadFileTool({ root: config.fileRoot }),
    ...createClipboardTools(),
    createShellTool({ cwd: config.fileRoot }),
    createScreenVisionTool({ model: config.model, window: config.window }),
  ];
}
