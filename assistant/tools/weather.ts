/**
 * get_weather: current conditions from OpenWeatherMap.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { getJson, pick } from "./http.js";

const WEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";

export interface WeatherToolConfig {
  /** OPENWEATHERMAP_API_KEY; the tool stays registered without it and reports the gap */
  apiKey: string | undefined;
  fetchImpl?: typeof fetch;
}

export function createWeatherTool(config: WeatherToolConfig): ToolDescriptor {
  const fetchImpl = config.fetchImpl ?? fetch;

  return {
    name: "get_weather",
    description: "Get the current weather for a city. Use when the user asks about weather or temperature somewhere.",
    parameters: {
      location: { type: "string", description: "City name, e.g. London or Tokyo", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "location",
      prompt: "Which city or place is this message asking about the weather for?",
    },
    handler: async (args, signal) => {
      if (!config.apiKey) {
        throw new ToolError("permission_denied", "OPENWEATHERMAP_API_KEY is not set");
      }
      const location = String(args.location);
      const query = new URLSearchParams({ q: location, appid: config.apiKey, units: "metric" });
      const { status, body } = await getJson(`${WEATHER_URL}?${query.toString()}`, signal, fetchImpl);

      if (status === 404) throw new ToolError("not_found", `no weather data for "${location}"`);
      if (status === 401) throw new ToolError("permission_denied", "the weather API key was rejected");
      if (status < 200 || status >= 300) throw new ToolError("failed", `weather service answered ${status}`);

      return formatWeather(body, location);
    },
  };
}

/**
 * @throws ToolError failed when the payload lacks the expected fields
 */
export function formatWeather(body: unknown, location: string): string {
  const temp = pick(body, "main", "temp");
  const feelsLike = pick(body, "main", "feels_like");
  const humidity = pick(body, "main", "humidity");
  const description = pick(body, "weather", 0, "description");
  const wind = pick(body, "wind", "speed");

  if (typeof temp !== "number" || typeof feelsLike !== "number" || typeof description !== "string") {
    throw new ToolError("failed", `unexpected weather data for "${location}"`);
  }

  const city = pick(body, "name");
  const country = pick(body, "sys", "country");
  const place = [typeof city === "string" ? city : location, typeof country === "string" ? country : ""].filter(Boolean).join(", ");

  const lines = [
    `Weather in ${place}:`,
    `  Conditions: ${description}`,
    `  Temperature: ${temp.toFixed(1)}°C (feels like ${feelsLike.toFixed(1)}°C)`,
  ];
  if (typeof humidity === "number") lines.push(`  Humidity: ${humidity}%`);
  if (typeof wind === "number") lines.push(`  Wind: ${wind} m/s`);
  return lines.join("\n");
}
