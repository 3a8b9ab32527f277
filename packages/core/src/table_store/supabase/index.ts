export { SupabaseTableStore } from './supabase_table_store';
