import {
  HardwareInitializationError,
  LogicLevel,
  RelayDriver,
  SimulatedPinDriver,
} from '../../src';
import { smallActuatorMap } from '../fixtures/layouts';

describe('RelayDriver', () => {
  let pins: SimulatedPinDriver;
  let driver: RelayDriver;

  beforeEach(() => {
    pins = new SimulatedPinDriver();
    driver = new RelayDriver(pins, smallActuatorMap().bindings);
  });

  describe('configure', () => {
    it('should claim every bound line at the idle level', () => {
      driver.configure();

      expect(driver.isConfigured).toBe(true);
      expect(driver.channels).toEqual([1, 2, 3]);
      expect(pins.levelOf(5)).toBe(LogicLevel.HIGH);
      expect(pins.levelOf(6)).toBe(LogicLevel.HIGH);
      expect(pins.levelOf(7)).toBe(LogicLevel.HIGH);
      expect(pins.engagedLines()).toEqual([]);
    });

    it('should be a no-op the second time', () => {
      driver.configure();
      driver.configure();

      expect(pins.history).toHaveLength(3);
    });

    it('should release already claimed lines when a line is refused', () => {
      pins.refuseLine(7);

      expect(() => driver.configure()).toThrow(HardwareInitializationError);
      expect(driver.isConfigured).toBe(false);
      expect(pins.pins.get(5)?.released).toBe(true);
      expect(pins.pins.get(6)?.released).toBe(true);
    });
  });

  describe('engage and disengage', () => {
    beforeEach(() => driver.configure());

    it('should drive a channel low and back high', () => {
      expect(driver.engage(2)).toBe(true);
      expect(pins.levelOf(6)).toBe(LogicLevel.LOW);
      expect(driver.levelOf(2)).toBe(LogicLevel.LOW);

      expect(driver.disengage(2)).toBe(true);
      expect(pins.levelOf(6)).toBe(LogicLevel.HIGH);
    });

    it('should skip an unregistered channel', () => {
      expect(driver.engage(9)).toBe(false);
      expect(driver.levelOf(9)).toBeUndefined();
      expect(pins.engagedLines()).toEqual([]);
    });

    it('should report a failing write without throwing', () => {
      pins.failWrites(5, LogicLevel.LOW);

      expect(driver.engage(1)).toBe(false);
      expect(pins.levelOf(5)).toBe(LogicLevel.HIGH);
      expect(driver.disengage(1)).toBe(true);
    });
  });

  describe('release', () => {
    it('should return every line to idle and give it back', () => {
      driver.configure();
      driver.engage(3);

      driver.release();

      expect(pins.levelOf(7)).toBe(LogicLevel.HIGH);
      expect(pins.pins.get(7)?.released).toBe(true);
      expect(driver.channels).toEqual([]);
      expect(driver.isConfigured).toBe(false);
    });
  });
});
