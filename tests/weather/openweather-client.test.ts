import { describe, it, expect, vi } from 'vitest';
import { OpenWeatherClient } from '../../src/weather/openweather-client.js';
import { WeatherApiError } from '../../src/errors.js';
import { ErrorType } from '../../src/types.js';

function respondWith(body: unknown, status = 200) {
  return vi.fn<typeof fetch>().mockImplementation(async () => new Response(JSON.stringify(body), { status }));
}

function requestedUrl(fetchImpl: ReturnType<typeof respondWith>, call = 0): string {
  return String(fetchImpl.mock.calls[call]?.[0]);
}

function createClient(fetchImpl: typeof fetch, units?: 'metric' | 'imperial'): OpenWeatherClient {
  return new OpenWeatherClient({ apiKey: 'test-key', fetchImpl, retryDelayMs: 0, units });
}

describe('OpenWeatherClient', () => {
  it('should_requireAPIKey', () => {
    expect(() => new OpenWeatherClient({ apiKey: '' })).toThrow('apiKey is required');
  });

  it('should_requestCurrentWeatherByCityWithUnitsLanguageAndKey', async () => {
    const fetchImpl = respondWith({ name: 'Paris' });

    await expect(createClient(fetchImpl).getCurrentWeatherByCity('Paris')).resolves.toEqual({ name: 'Paris' });
    expect(requestedUrl(fetchImpl)).toBe(
      'https://api.openweathermap.org/data/2.5/weather?q=Paris&units=metric&lang=en&appid=test-key'
    );
  });

  it('should_requestCurrentWeatherByCoordinates', async () => {
    const fetchImpl = respondWith({ name: 'Paris' });

    await createClient(fetchImpl, 'imperial').getCurrentWeatherByCoordinates(48.85, 2.35);

    expect(requestedUrl(fetchImpl)).toBe(
      'https://api.openweathermap.org/data/2.5/weather?lat=48.85&lon=2.35&units=imperial&lang=en&appid=test-key'
    );
  });

  it('should_requestForecastByCity', async () => {
    const fetchImpl = respondWith({ city: { name: 'New York' }, list: [] });

    await createClient(fetchImpl).getForecastByCity('New York');

    expect(requestedUrl(fetchImpl)).toBe(
      'https://api.openweathermap.org/data/2.5/forecast?q=New+York&units=metric&lang=en&appid=test-key'
    );
  });

  it('should_requestAirQualityWithoutUnitsOrLanguage', async () => {
    const fetchImpl = respondWith({ list: [{ main: { aqi: 1 }, components: {} }] });

    await createClient(fetchImpl).getAirQuality(55.75, 37.61);

    expect(requestedUrl(fetchImpl)).toBe(
      'https://api.openweathermap.org/data/2.5/air_pollution?lat=55.75&lon=37.61&appid=test-key'
    );
  });

  it('should_geocodeCityToItsFirstMatch', async () => {
    const places = [{ name: 'Oslo', lat: 59.91, lon: 10.75, country: 'NO' }];
    const fetchImpl = respondWith(places);

    await expect(createClient(fetchImpl).geocodeCity('oslo')).resolves.toEqual(places);
    expect(requestedUrl(fetchImpl)).toBe('https://api.openweathermap.org/geo/1.0/direct?q=oslo&limit=1&appid=test-key');
  });

  it('should_reportUnknownCity_when_geocodingFindsNothing', async () => {
    const client = createClient(respondWith([]));

    const error = await client.geocodeCity('Atlantis').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WeatherApiError);
    expect(error instanceof WeatherApiError && error.errorType).toBe(ErrorType.NOT_FOUND);
    expect(error instanceof WeatherApiError && error.message).toBe('City "Atlantis" not found');
  });

  it('should_reverseGeocodeCoordinates', async () => {
    const fetchImpl = respondWith([{ name: 'Lisbon', lat: 38.72, lon: -9.14 }]);

    await createClient(fetchImpl).reverseGeocode(38.72, -9.14);

    expect(requestedUrl(fetchImpl)).toBe(
      'https://api.openweathermap.org/geo/1.0/reverse?lat=38.72&lon=-9.14&limit=1&appid=test-key'
    );
  });

  it('should_reportEmptyReverseGeocodingResultAsNotFound', async () => {
    const client = createClient(respondWith([]));

    await expect(client.reverseGeocode(0, 0)).rejects.toThrow('No place found at (0, 0)');
  });

  it('should_turn404ForCityIntoNotFoundError', async () => {
    const client = createClient(respondWith({ cod: '404', message: 'city not found' }, 404));

    await expect(client.getForecastByCity('Nowhere')).rejects.toThrow('City "Nowhere" not found');
  });
});
