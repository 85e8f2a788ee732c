/**
 * Lifecycle hooks a controlled device may need around connection.
 * A simulated endpoint needs none of them.
 */
export interface DeviceCapabilities {
    readonly isCalibrated: boolean;
    calibrate(): void | Promise<void>;
    configure(): void | Promise<void>;
}

export const noopCapabilities: DeviceCapabilities = Object.freeze({
    isCalibrated: true,
    calibrate() {},
    configure() {},
});

/** What sits at the far end of the channel, chosen at construction. */
export type DeviceVariant =
    | { kind: "simulated-endpoint" }
    | { kind: "physical-device"; capabilities: DeviceCapabilities };

export function capabilitiesOf(variant: DeviceVariant): DeviceCapabilities {
    switch (variant.kind) {
        case "simulated-endpoint":
            return noopCapabilities;
        case "physical-device":
            return variant.capabilities;
    }
}

/** Run the post-connect hooks: configure, then calibrate when asked and needed. */
export async function prepareDevice(
    capabilities: DeviceCapabilities,
    options: { calibrate?: boolean } = {},
): Promise<void> {
    await capabilities.configure();
    if (options.calibrate && !capabilities.isCalibrated) {
        await capabilities.calibrate();
    }
}
