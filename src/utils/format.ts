// "new york" -> "New york", mirroring how city names are echoed back to clients
export function capitalize(value: string): string {
    if (!value) return value;
    return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}
