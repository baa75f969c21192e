/**
 * Rover Telemetry Constants
 * Centralized definitions for register layout, calibration and default settings
 */

// SBUS calibration (raw transceiver units)
export const SBUS_MAX = 1811;                 // Full deflection
export const SBUS_MID = 991;                  // Centered stick / switch midpoint
export const SBUS_MIN = 172;                  // Full opposite deflection
export const SBUS_RANGE = 820.0;              // Half span used for normalization
export const SBUS_DEADZONE = 5;               // Mode switch dead band
export const NO_INPUT_SENTINEL = 0;           // Raw value reported when no controller is bound

// Register map (index within one snapshot)
export const REG_LEFT_STICK_Y = 0;
export const REG_RIGHT_STICK_Y = 1;
export const REG_RIGHT_STICK_X = 2;
export const REG_LEFT_STICK_X = 3;
export const REG_LEFT_POT = 4;
export const REG_S1_POT = 5;
export const REG_S2_POT = 6;
export const REG_RIGHT_POT = 7;
export const REG_SA_SWITCH = 8;
export const REG_SB_SWITCH = 9;
export const REG_SC_SWITCH = 10;
export const REG_SD_SWITCH = 11;
export const REG_SE_SWITCH = 12;
export const REG_SF_SWITCH = 13;
export const REG_SG_SWITCH = 14;
export const REG_SH_SWITCH = 15;
export const REG_VOLTAGE_24V = 16;
export const REG_VOLTAGE_5V = 17;
export const REG_USB_VOLTAGE_5V = 18;
export const REG_VOLTAGE_3V3 = 19;

export const REGISTER_START = 0;              // First register of the snapshot
export const REGISTER_COUNT = 20;             // Registers per snapshot
export const MAX_REGISTER_VALUE = 0xFFFF;     // 16-bit holding register

// Voltage registers are reported in centivolts
export const DEFAULT_VOLTAGE_SCALE = 0.01;

// Serial link
export const DEFAULT_SERIAL_PORT = '/dev/rover/ttyIRIS';
export const DEFAULT_BAUD = 115200;
export const DEFAULT_MODBUS_ID = 1;
export const DEFAULT_TRANSPORT_TIMEOUT = 150;  // Per-call read timeout (ms)
export const DEFAULT_TURNAROUND_DELAY = 10;    // RS-485 turnaround after each exchange (ms)

// Timing
export const DEFAULT_HERTZ = 10;
export const DEFAULT_CONNECTED_TIMEOUT = 300;  // Connected while last read is younger (ms)
export const DEFAULT_HARD_DISCONNECT = 1000;   // Process exits past this (ms)
export const MAX_JETSON_UPDATE_HERTZ = 0.2;
export const MAX_BATTERY_UPDATE_HERTZ = 0.2;

// Iris node topics
export const DEFAULT_DRIVE_COMMAND_TOPIC = 'rover_control/command_control/iris_drive';
export const DEFAULT_IRIS_STATUS_TOPIC = 'rover_control/iris_status';

// Status node published topics
export const DEFAULT_BATTERY_TOPIC = 'rover_status/battery_status';
export const DEFAULT_CAMERA_TOPIC = 'rover_status/camera_status';
export const DEFAULT_WHEEL_TOPIC = 'rover_status/wheel_status';
export const DEFAULT_CONTROLLER_TOPIC = 'rover_status/frsky_status';
export const DEFAULT_GPS_TOPIC = 'rover_status/gps_status';
export const DEFAULT_JETSON_TOPIC = 'rover_status/jetson_status';
export const DEFAULT_MISC_TOPIC = 'rover_status/misc_status';

// Status node subscribed topics
export const DEFAULT_REQUEST_UPDATE_TOPIC = 'rover_status/update_requested';
export const DEFAULT_DRIVE_STATUS_LEFT_TOPIC = 'rover_control/drive_status/left';
export const DEFAULT_DRIVE_STATUS_RIGHT_TOPIC = 'rover_control/drive_status/right';
export const DEFAULT_DRIVE_STATUS_REAR_TOPIC = 'rover_control/drive_status/rear';
export const DEFAULT_GPS_SENTENCE_TOPIC = 'rover_odometry/gps/sentence';

// Presence and disk checks
export const DEFAULT_CAMERA_PATHS = {
    zed: '/dev/rover/camera_zed',
    undercarriage: '/dev/rover/camera_undercarriage',
    chassis: '/dev/rover/camera_chassis',
    mainNavigation: '/dev/rover/camera_main_navigation'
};
export const DEFAULT_EMMC_MOUNT = '/';
export const DEFAULT_NVME_MOUNT = '/dev/shm';
export const DEFAULT_SENSORS_COMMAND = 'sensors';
export const DEFAULT_GPU_TEMP_LINE = 2;      // Third `temp` line of sensors output

// Sentinels
export const GPU_TEMP_UNAVAILABLE = -1.0;     // GPU temperature could not be read
export const HEADING_UNAVAILABLE = -1.0;      // No true track in the last VTG sentence

// Bus
export const DEFAULT_BROKER_URL = 'mqtt://localhost:1883';
