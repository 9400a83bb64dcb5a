// Pacific/Apia skipped 2011-12-30 when it moved across the date line, so any
// conversion that slips into local time fails here.
export default function globalSetup(): void {
    process.env.TZ = "Pacific/Apia";
}
