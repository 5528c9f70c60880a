#!/usr/bin/env node
/**
 * CLI Entry Point - interactive weather lookup
 */

import prompts from 'prompts';
import { CacheManager } from '../caching/cache-manager.js';
import { JsonFileRecordStore } from '../caching/json-record-store.js';
import { loadConfig, requireApiKey } from '../config/loader.js';
import { NotificationChecker } from '../notifications/notification-checker.js';
import { NotificationScheduler } from '../notifications/notification-scheduler.js';
import { UserSettingsStore } from '../settings/user-settings-store.js';
import { normalizeError } from '../utils.js';
import { OpenWeatherClient } from '../weather/openweather-client.js';
import { WeatherService } from '../weather/weather-service.js';
import { MODES, WeatherCommands, formatStatus, parseCoordinate, stripMarkup, type Mode } from './commands.js';

const FORECAST_DAYS = ['Today', 'Tomorrow', 'In 2 days', 'In 3 days', 'In 4 days'];

/**
 * Ask for one line of text. null when the prompt was cancelled.
 */
async function askText(message: string, validate?: (value: string) => true | string): Promise<string | null> {
  const response = await prompts({
    type: 'text',
    name: 'value',
    message,
    validate: (value: string) => {
      if (value.trim().length === 0) {
        return 'Please enter a value';
      }
      return validate ? validate(value) : true;
    },
  });
  const value: unknown = response.value;
  return typeof value === 'string' ? value.trim() : null;
}

async function askMode(): Promise<Mode> {
  const response = await prompts({
    type: 'select',
    name: 'mode',
    message: 'Choose a mode',
    choices: MODES.map(mode => ({ title: mode.title, value: mode.value })),
    initial: 0,
  });
  const selected: unknown = response.mode;
  // Ctrl+C / ESC leaves the answer empty
  return MODES.find(mode => mode.value === selected)?.value ?? 'exit';
}

async function askCoordinate(axis: 'lat' | 'lon'): Promise<number | null> {
  const limit = axis === 'lat' ? 90 : 180;
  const label = axis === 'lat' ? 'Latitude' : 'Longitude';
  const answer = await askText(label, value =>
    parseCoordinate(value, axis) !== null ? true : `${label} must be a number between -${limit} and ${limit}`
  );
  return answer === null ? null : parseCoordinate(answer, axis);
}

async function runForecast(commands: WeatherCommands): Promise<void> {
  const city = await askText('City name');
  if (city === null || !(await commands.forecast(city))) {
    return;
  }

  const response = await prompts({
    type: 'select',
    name: 'day',
    message: 'Show the detailed forecast for',
    choices: [
      ...FORECAST_DAYS.map((title, offset) => ({ title, value: offset })),
      { title: 'Back', value: -1 },
    ],
  });
  const day: unknown = response.day;
  if (typeof day === 'number' && day >= 0) {
    await commands.forecastDay(city, day);
  }
}

async function runLocation(commands: WeatherCommands): Promise<void> {
  const lat = await askCoordinate('lat');
  const lon = lat === null ? null : await askCoordinate('lon');
  if (lat !== null && lon !== null) {
    await commands.shareLocation(lat, lon);
  }
}

async function runNotifications(commands: WeatherCommands): Promise<void> {
  for (;;) {
    await commands.showNotifications();
    const response = await prompts({
      type: 'select',
      name: 'action',
      message: 'Notification settings',
      choices: [
        { title: 'Turn on / off', value: 'toggle' },
        { title: 'Change interval', value: 'interval' },
        { title: 'Back', value: 'back' },
      ],
    });
    const action: unknown = response.action;
    if (action === 'toggle') {
      await commands.switchNotifications();
    } else if (action === 'interval') {
      await commands.changeNotificationInterval();
    } else {
      return;
    }
  }
}

async function runMode(mode: Exclude<Mode, 'exit'>, commands: WeatherCommands): Promise<void> {
  switch (mode) {
    case 'city': {
      const city = await askText('City name');
      if (city !== null) await commands.weatherByCity(city);
      return;
    }
    case 'coordinates': {
      const lat = await askCoordinate('lat');
      const lon = lat === null ? null : await askCoordinate('lon');
      if (lat !== null && lon !== null) await commands.weatherByCoordinates(lat, lon);
      return;
    }
    case 'location':
      return runLocation(commands);
    case 'saved':
      await commands.savedLocationWeather();
      return;
    case 'forecast':
      return runForecast(commands);
    case 'extended': {
      const city = await askText('City name');
      if (city !== null) await commands.extended(city);
      return;
    }
    case 'compare': {
      const input = await askText('Two cities separated by a comma (e.g. Paris, London)');
      if (input !== null) await commands.compare(input);
      return;
    }
    case 'notifications':
      return runNotifications(commands);
    case 'stats':
      return commands.stats();
    case 'purge':
      await commands.purge();
      return;
  }
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  let scheduler: NotificationScheduler | null = null;

  try {
    const config = loadConfig();
    const apiKey = requireApiKey(config);

    const client = new OpenWeatherClient({
      apiKey,
      units: config.api.units,
      lang: config.api.lang,
      maxAttempts: config.api.maxAttempts,
      retryDelayMs: config.api.retryDelayMs,
    });
    const cache = new CacheManager(new JsonFileRecordStore(config.cache.path), { ttlMs: config.cache.ttlMs });
    const settings = new UserSettingsStore(config.settings.path);
    const service = new WeatherService(client, cache, { serveStale: config.cache.serveStale });
    const commands = new WeatherCommands(service, cache, settings, text => console.log(`\n${text}\n`), {
      units: config.api.units,
    });

    const checker = new NotificationChecker(
      settings,
      service,
      async (_userId, text) => {
        console.log(`\n${stripMarkup(text)}\n`);
      },
      { units: config.api.units }
    );
    scheduler = new NotificationScheduler(checker, { intervalMs: config.notifications.checkIntervalMs });

    console.log('\n🌤️  weather-lookup\n');

    // Anything already due goes out before the first prompt
    await scheduler.runOnce();
    scheduler.start();

    for (;;) {
      const mode = await askMode();
      if (mode === 'exit') {
        console.log('\n👋 Goodbye!');
        return;
      }
      await runMode(mode, commands);
    }
  } catch (error) {
    console.error(`\n${formatStatus('error', normalizeError(error).message)}`);
    process.exitCode = 1;
  } finally {
    scheduler?.stop();
  }
}

// Run
main().catch(error => {
  console.error('Fatal:', error);
  process.exit(1);
});
